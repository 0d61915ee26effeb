/**
 * backend/src/modules/auth/session/revocation.store.ts
 *
 * WHY:
 * - Tracks revoked token ids until the token's own expiry.
 * - Shared across every process and every concurrent connection, so it lives in
 *   the Cache (Redis in production) and relies on the cache's atomic primitives.
 *
 * RULES:
 * - revoke() is idempotent and reports whether THIS call created the record.
 *   Refresh rotation uses that to make refresh tokens single-use under races.
 * - Records self-expire at `expiresAt`. Revoking an already-expired token is a no-op:
 *   TokenCodec rejects it anyway.
 */

import type { Cache } from '../../../shared/cache/cache';
import type { Clock } from '../../../shared/time/clock';
import { systemClock } from '../../../shared/time/clock';
import { REVOCATION_KEY_PREFIX } from '../auth.constants';

export interface RevocationStore {
  isRevoked(tokenId: string): Promise<boolean>;

  /**
   * Returns true when this call recorded the revocation, false when the token
   * was already revoked or already expired.
   */
  revoke(tokenId: string, expiresAt: number): Promise<boolean>;
}

export function revocationKey(tokenId: string): string {
  return `${REVOCATION_KEY_PREFIX}:${tokenId}`;
}

export class CacheRevocationStore implements RevocationStore {
  constructor(
    private readonly cache: Cache,
    private readonly clock: Clock = systemClock,
  ) {}

  async isRevoked(tokenId: string): Promise<boolean> {
    const value = await this.cache.get(revocationKey(tokenId));
    return value !== null;
  }

  async revoke(tokenId: string, expiresAt: number): Promise<boolean> {
    const ttlSeconds = expiresAt - this.clock();
    if (ttlSeconds <= 0) return false;

    return this.cache.setIfAbsent(revocationKey(tokenId), String(expiresAt), { ttlSeconds });
  }
}
