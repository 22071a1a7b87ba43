/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Rate limiting and the cross-process registration guard need fast, externalized state.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.setIfAbsent(key, value, { ttlSeconds }) -> true only for the writer that created the key
 * - cache.incr(key, { ttlSeconds }) -> counter with expiration
 * - cache.sadd / smembers / srem -> Redis SET semantics (index of in-flight guard keys)
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Atomically create `key` only if it does not exist (Redis SET NX).
   * Returns true when this call created the key.
   */
  setIfAbsent(key: string, value: string, opts?: CacheSetOptions): Promise<boolean>;

  /**
   * Atomically increment a counter and (optionally) ensure it expires.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;

  /**
   * Add a member to a set. Idempotent — adding an existing member is a no-op.
   * Optionally refresh the TTL on the set key.
   */
  sadd(key: string, member: string, opts?: { ttlSeconds?: number }): Promise<void>;

  /**
   * Return all members of a set, or an empty array if the key does not exist.
   */
  smembers(key: string): Promise<string[]>;

  /**
   * Remove a member from a set. No-op if the member is not present.
   */
  srem(key: string, member: string): Promise<void>;
}
