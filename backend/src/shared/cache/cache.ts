/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Rate limiting and token revocation are short-lived security state that must be
 *   fast, shared across processes, and self-expiring.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.setIfAbsent(key, value, { ttlSeconds }) -> true only for the caller that created the key
 * - cache.incr(key, { ttlSeconds }) -> counter with expiration
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /**
   * Atomically create `key` if it does not exist (Redis SET NX).
   * Returns true when this call created the key, false when it already existed.
   * Concurrent callers for the same key: exactly one gets true.
   */
  setIfAbsent(key: string, value: string, opts?: CacheSetOptions): Promise<boolean>;

  /**
   * Atomically increment a counter and (optionally) ensure it expires.
   * Returns the new value.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;
}
