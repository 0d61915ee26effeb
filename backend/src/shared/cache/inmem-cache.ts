/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests (and local dev without Redis) to run without external infra.
 * - Every method completes its read-modify-write synchronously before resolving,
 *   so concurrent callers on the event loop cannot interleave inside one operation.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache(() => fakeNowMs)   // controllable clock for expiry tests
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  private expiryFor(opts?: CacheSetOptions): number | null {
    return opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
  }

  /** Number of live keys (expired entries are purged first). */
  size(): number {
    for (const key of Array.from(this.store.keys())) this.getEntry(key);
    return this.store.size;
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
    if (this.getEntry(key)) return Promise.resolve(false);

    this.store.set(key, { value, expiresAtMs: this.expiryFor(opts) });
    return Promise.resolve(true);
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.getEntry(key);
    const next = entry ? Number(entry.value) + 1 : 1;

    const expiresAtMs = opts?.ttlSeconds
      ? this.now() + opts.ttlSeconds * 1000
      : (entry?.expiresAtMs ?? null);

    this.store.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }
}
