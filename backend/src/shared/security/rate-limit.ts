/**
 * backend/src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Throttles credential-bearing endpoints (login per email and per IP, refresh per IP).
 * - Uses Redis in prod, but depends only on Cache.
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - await limiter.hitOrThrow({ key: 'login:ip:1.2.3.4', limit: 20, windowSeconds: 900 })
 *
 * ATOMICITY:
 * - INCR-then-check, never check-then-INCR. Two concurrent requests both
 *   increment; the one that pushes the counter over the limit is rejected.
 *
 * DISABLING:
 * - `disabled: true` skips all checks (composition root decides, never NODE_ENV here).
 */

import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export type RateLimitRule = {
  limit: number;
  windowSeconds: number;
};

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  /** Throws RateLimitError once the counter for `key` exceeds `limit` within the window. */
  async hitOrThrow(input: { key: string } & RateLimitRule): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }
}
