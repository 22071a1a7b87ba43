/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev without Redis) to run without external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache(() => fakeNowMs)  // deterministic expiry in tests
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();
  private readonly sets = new Map<string, Set<string>>();
  private readonly setExpiry = new Map<string, number | null>();

  constructor(private readonly clock: () => number = Date.now) {}

  private now(): number {
    return this.clock();
  }

  private expiryFor(opts?: CacheSetOptions): number | null {
    return opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  private evictSetIfExpired(key: string): void {
    const exp = this.setExpiry.get(key);
    if (exp === undefined || exp === null) return;
    if (exp <= this.now()) {
      this.sets.delete(key);
      this.setExpiry.delete(key);
    }
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    this.store.set(key, { value, expiresAtMs: this.expiryFor(opts) });
    return Promise.resolve();
  }

  setIfAbsent(key: string, value: string, opts?: CacheSetOptions): Promise<boolean> {
    // Check + insert run in one synchronous turn, so no other caller can interleave.
    if (this.getEntry(key)) return Promise.resolve(false);

    this.store.set(key, { value, expiresAtMs: this.expiryFor(opts) });
    return Promise.resolve(true);
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    this.sets.delete(key);
    this.setExpiry.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    // Fixed window, like RedisCache: the TTL is set only when the counter has none.
    const current = entry?.expiresAtMs ?? null;
    const expiresAtMs =
      current === null && opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : current;

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

  sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void> {
    this.evictSetIfExpired(key);

    let set = this.sets.get(key);
    if (!set) {
      set = new Set<string>();
      this.sets.set(key, set);
    }
    set.add(member);

    // Refresh TTL on every sadd (same as Redis EXPIRE behaviour on SADD)
    if (opts?.ttlSeconds !== undefined) {
      this.setExpiry.set(key, this.now() + opts.ttlSeconds * 1000);
    } else if (!this.setExpiry.has(key)) {
      this.setExpiry.set(key, null);
    }

    return Promise.resolve();
  }

  smembers(key: string): Promise<string[]> {
    this.evictSetIfExpired(key);

    const set = this.sets.get(key);
    return Promise.resolve(set ? Array.from(set) : []);
  }

  srem(key: string, member: string): Promise<void> {
    this.evictSetIfExpired(key);

    this.sets.get(key)?.delete(member);
    return Promise.resolve();
  }
}
