/**
 * backend/src/modules/auth/session/session.service.ts
 *
 * WHY:
 * - The only component that knows token semantics (type, expiry, claims).
 * - Orchestrates TokenCodec + RevocationStore to issue, verify, rotate and revoke
 *   access/refresh pairs.
 *
 * RULES:
 * - verify() is the single trust choke point. Nothing else calls TokenCodec.decode()
 *   to make an authentication decision.
 * - Refresh tokens are single-use: the old refresh token is claimed (revoked)
 *   before a new pair is issued, and only the caller that wins the claim gets a pair.
 * - Stateless apart from the RevocationStore. Safe to share across requests.
 * - A user may hold any number of live token pairs. Logout and refresh revoke only
 *   the token exchanged.
 */

import type { User } from '../../users/user.types';
import type { UserStore } from '../../users/user.store';
import { AuthErrors } from '../auth.errors';
import type { SessionClaims, TokenPair } from '../auth.types';
import { isTokenType } from '../policies/token-type.policy';
import type { RevocationStore } from './revocation.store';
import type { TokenCodec } from './token-codec';

export type SessionUser = Pick<User, 'id' | 'organizationId' | 'role'>;

export type SessionServiceDeps = {
  codec: TokenCodec;
  revocations: RevocationStore;
  users: UserStore;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
};

export type IssuedTokenPair = TokenPair & {
  accessClaims: SessionClaims;
  refreshClaims: SessionClaims;
};

export class SessionService {
  constructor(private readonly deps: SessionServiceDeps) {}

  issueTokenPair(user: SessionUser): IssuedTokenPair {
    const base = {
      subject: user.id,
      organizationId: user.organizationId,
      role: user.role,
    };

    const access = this.deps.codec.encode(
      { ...base, tokenType: 'access' },
      { ttlSeconds: this.deps.accessTtlSeconds },
    );
    const refresh = this.deps.codec.encode(
      { ...base, tokenType: 'refresh' },
      { ttlSeconds: this.deps.refreshTtlSeconds },
    );

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      expiresIn: this.deps.accessTtlSeconds,
      tokenType: 'Bearer',
      accessClaims: access.claims,
      refreshClaims: refresh.claims,
    };
  }

  /** Decode + revocation check. Throws TOKEN_EXPIRED, TOKEN_INVALID or TOKEN_REVOKED. */
  async verify(token: string): Promise<SessionClaims> {
    const claims = this.deps.codec.decode(token);

    if (await this.deps.revocations.isRevoked(claims.tokenId)) {
      throw AuthErrors.tokenRevoked();
    }

    return claims;
  }

  async refresh(refreshToken: string): Promise<IssuedTokenPair> {
    const claims = await this.verify(refreshToken);

    if (!isTokenType(claims, 'refresh')) {
      throw AuthErrors.wrongTokenType({ expected: 'refresh', actual: claims.tokenType });
    }

    const user = await this.deps.users.findById(claims.subject);
    if (!user) {
      throw AuthErrors.userNotFound({ userId: claims.subject });
    }

    // Claim the old token. Losing the claim means a concurrent refresh already used it.
    const claimed = await this.deps.revocations.revoke(claims.tokenId, claims.expiresAt);
    if (!claimed) {
      throw AuthErrors.tokenRevoked();
    }

    return this.issueTokenPair(user);
  }

  /**
   * Tolerant: anything that does not carry our signature or a token id is ignored.
   * Unreadable expiry falls back to the access lifetime from now.
   */
  async revokeToken(token: string): Promise<void> {
    const target = this.deps.codec.readRevocationTarget(token);
    if (!target) return;

    const expiresAt = target.expiresAt ?? this.deps.codec.now() + this.deps.accessTtlSeconds;
    await this.deps.revocations.revoke(target.tokenId, expiresAt);
  }
}
