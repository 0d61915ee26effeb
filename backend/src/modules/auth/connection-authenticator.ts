/**
 * backend/src/modules/auth/connection-authenticator.ts
 *
 * WHY:
 * - Turns a token declared by a connection attempt (cable `?token=`, HTTP Bearer)
 *   into a server-derived Identity, or a typed rejection.
 * - Per attempt: Pending -> Authenticated | Rejected. No retries here; a rejected
 *   caller reconnects with a fresh token.
 *
 * RULES:
 * - Only SessionService.verify() decides whether a token is trusted.
 * - Refresh tokens are always rejected.
 * - The Identity is built from the LIVE user record at authentication time and
 *   frozen. Later user changes do not alter an already-open connection.
 * - Token claims other than the type are not compared with the live record:
 *   a user who moved organizations authenticates into the new one.
 * - Infrastructure failures (DB/cache down) are not rejections: they propagate.
 */

import { AppError } from '../../shared/http/errors';
import type { OrganizationStore } from '../organizations/organization.store';
import type { UserStore } from '../users/user.store';
import type { AuthFailureReason, Identity, SessionClaims, UserSummary } from './auth.types';
import { isTokenType } from './policies/token-type.policy';
import type { SessionService } from './session/session.service';

export type ConnectionAuthResult =
  | { status: 'authenticated'; identity: Identity; user: UserSummary; claims: SessionClaims }
  | { status: 'rejected'; reason: AuthFailureReason };

function rejected(reason: AuthFailureReason): ConnectionAuthResult {
  return { status: 'rejected', reason };
}

function reasonFromError(err: AppError): AuthFailureReason | null {
  switch (err.code) {
    case 'TOKEN_EXPIRED':
      return 'token_expired';
    case 'TOKEN_REVOKED':
      return 'token_revoked';
    case 'TOKEN_INVALID':
      return 'token_invalid';
    default:
      return null;
  }
}

export class ConnectionAuthenticator {
  constructor(
    private readonly deps: {
      sessions: SessionService;
      users: UserStore;
      organizations: OrganizationStore;
    },
  ) {}

  async authenticate(token: string | null | undefined): Promise<ConnectionAuthResult> {
    if (!token) return rejected('token_missing');

    let claims: SessionClaims;
    try {
      claims = await this.deps.sessions.verify(token);
    } catch (err) {
      const reason = err instanceof AppError ? reasonFromError(err) : null;
      if (!reason) throw err;
      return rejected(reason);
    }

    if (!isTokenType(claims, 'access')) return rejected('wrong_token_type');

    const user = await this.deps.users.findById(claims.subject);
    if (!user) return rejected('user_not_found');

    if (!user.organizationId) return rejected('no_organization');

    // The organization row must still exist for the user to hold a tenant scope.
    const organization = await this.deps.organizations.findById(user.organizationId);
    if (!organization) return rejected('no_organization');

    const identity: Identity = Object.freeze({
      userId: user.id,
      organizationId: user.organizationId,
      role: user.role,
    });

    const summary: UserSummary = Object.freeze({
      id: user.id,
      fullName: user.fullName,
      role: user.role,
    });

    return { status: 'authenticated', identity, user: summary, claims };
  }
}
