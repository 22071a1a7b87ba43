/**
 * backend/src/modules/registration/guard/cache-registration.guard.ts
 *
 * WHY:
 * - Guard shared by every instance of the service (Redis in production),
 *   so registration can run on more than one process.
 *
 * HOW IT WORKS:
 * - Each in-flight key is a lease: SET <prefix>:key:<k> NX EX <ttl>.
 *   The TTL bounds how long a crashed process can wedge a key.
 * - An index set (<prefix>:index) lists leased keys for snapshot()/clearAll().
 *   The index can hold expired leases; readers filter them out.
 *
 * RULES:
 * - tryAdmit() correctness relies on setIfAbsent only.
 * - tryAdmit() either admits (lease + index entry) or leaves no lease behind:
 *   if the index write fails, the lease is deleted before the error propagates.
 */

import type { Cache } from '../../../shared/cache/cache';
import type { Logger } from '../../../shared/logger/logger';
import type { RegistrationGuard } from './registration-guard';

export class CacheRegistrationGuard implements RegistrationGuard {
  private readonly indexKey: string;

  constructor(
    private readonly deps: {
      cache: Cache;
      logger: Logger;
      ttlSeconds: number;
      prefix?: string;
    },
  ) {
    this.indexKey = `${this.prefix}:index`;
  }

  private get prefix(): string {
    return this.deps.prefix ?? 'registration-guard';
  }

  private leaseKey(key: string): string {
    return `${this.prefix}:key:${key}`;
  }

  async tryAdmit(key: string): Promise<boolean> {
    const admitted = await this.deps.cache.setIfAbsent(this.leaseKey(key), '1', {
      ttlSeconds: this.deps.ttlSeconds,
    });

    if (!admitted) return false;

    try {
      await this.deps.cache.sadd(this.indexKey, key, { ttlSeconds: this.deps.ttlSeconds });
    } catch (err: unknown) {
      // The caller never sees an admission here, so it will never release: drop the lease now.
      await this.dropLease(key, err);
      throw err;
    }

    return true;
  }

  private async dropLease(key: string, cause: unknown): Promise<void> {
    try {
      await this.deps.cache.del(this.leaseKey(key));
    } catch (delErr: unknown) {
      this.deps.logger.error({
        msg: 'registration.guard.lease_drop_failed',
        flow: 'registration.guard',
        driver: 'cache',
        ttlSeconds: this.deps.ttlSeconds,
        cause: cause instanceof Error ? cause.message : String(cause),
        error: delErr instanceof Error ? delErr.message : String(delErr),
      });
    }
  }

  async release(key: string): Promise<void> {
    await this.deps.cache.del(this.leaseKey(key));
    await this.deps.cache.srem(this.indexKey, key);
  }

  async inFlightCount(): Promise<number> {
    return (await this.snapshot()).length;
  }

  async snapshot(): Promise<string[]> {
    const indexed = await this.deps.cache.smembers(this.indexKey);
    const live: string[] = [];

    for (const key of indexed) {
      if ((await this.deps.cache.get(this.leaseKey(key))) !== null) {
        live.push(key);
      } else {
        await this.deps.cache.srem(this.indexKey, key);
      }
    }

    return live;
  }

  async clearAll(): Promise<number> {
    const keys = await this.snapshot();

    for (const key of keys) {
      await this.release(key);
    }

    this.deps.logger.warn({
      msg: 'registration.guard.cleared',
      flow: 'registration.guard',
      driver: 'cache',
      cleared: keys.length,
    });

    return keys.length;
  }
}
