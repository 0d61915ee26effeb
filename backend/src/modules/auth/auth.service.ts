/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Entry point for the HTTP auth endpoints: login, refresh, logout.
 * - Keeps the controller free of session semantics. Token rules live in
 *   SessionService; multi-step use-cases live in flows/.
 *
 * RULES:
 * - Rate limit at the start of each flow (before any lookup).
 * - Never store/log raw passwords or tokens.
 * - Logout revokes only the tokens presented. A user may hold several live sessions.
 */

import type { Logger } from '../../shared/logger/logger';
import type { KeyHasher } from '../../shared/security/key-hasher';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { OrganizationStore } from '../organizations/organization.store';
import type { UserStore } from '../users/user.store';

import { AUTH_RATE_LIMITS } from './auth.constants';
import type { AuthResult, TokenPair } from './auth.types';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import type { SessionService } from './session/session.service';

export type RefreshParams = {
  refreshToken: string;
  ip: string;
  requestId: string;
};

export type LogoutParams = {
  accessToken: string;
  refreshToken: string | null;
  userId: string;
  requestId: string;
};

export class AuthService {
  constructor(
    private readonly deps: {
      users: UserStore;
      organizations: OrganizationStore;
      sessions: SessionService;
      passwordHasher: PasswordHasher;
      keyHasher: KeyHasher;
      rateLimiter: RateLimiter;
      logger: Logger;
    },
  ) {}

  login(params: LoginParams): Promise<AuthResult> {
    return executeLoginFlow(this.deps, params);
  }

  async refresh(params: RefreshParams): Promise<TokenPair> {
    await this.deps.rateLimiter.hitOrThrow({
      key: `refresh:ip:${params.ip}`,
      ...AUTH_RATE_LIMITS.refresh.perIp,
    });

    const pair = await this.deps.sessions.refresh(params.refreshToken);

    this.deps.logger.info('auth.refresh.success', {
      flow: 'auth.refresh',
      requestId: params.requestId,
      userId: pair.accessClaims.subject,
    });

    return {
      accessToken: pair.accessToken,
      refreshToken: pair.refreshToken,
      expiresIn: pair.expiresIn,
      tokenType: pair.tokenType,
    };
  }

  async logout(params: LogoutParams): Promise<void> {
    await this.deps.sessions.revokeToken(params.accessToken);
    if (params.refreshToken) {
      await this.deps.sessions.revokeToken(params.refreshToken);
    }

    this.deps.logger.info('auth.logout.success', {
      flow: 'auth.logout',
      requestId: params.requestId,
      userId: params.userId,
      refreshRevoked: params.refreshToken !== null,
    });
  }
}
