/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = one end-to-end use-case kept out of AuthService.
 * - Password login: rate limit, check credentials, require an organization,
 *   issue a token pair.
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - Rate limit before any lookup.
 * - Unknown email, missing password hash and wrong password produce the same error.
 * - Never log raw emails, passwords or tokens. Logs carry the email domain and
 *   the hashed email key only.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { KeyHasher } from '../../../../shared/security/key-hasher';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { OrganizationStore } from '../../../organizations/organization.store';
import type { UserStore } from '../../../users/user.store';

import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import type { AuthResult } from '../../auth.types';
import type { SessionService } from '../../session/session.service';

function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

export type LoginParams = {
  email: string;
  password: string;
  ip: string;
  requestId: string;
};

export type LoginFlowDeps = {
  users: UserStore;
  organizations: OrganizationStore;
  sessions: SessionService;
  passwordHasher: PasswordHasher;
  keyHasher: KeyHasher;
  rateLimiter: RateLimiter;
  logger: Logger;
};

export async function executeLoginFlow(deps: LoginFlowDeps, params: LoginParams): Promise<AuthResult> {
  const email = params.email.trim().toLowerCase();
  const emailKey = deps.keyHasher.hash(email);
  const logMeta = {
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
  };

  deps.logger.info('auth.login.start', logMeta);

  await deps.rateLimiter.hitOrThrow({
    key: `login:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.login.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  const found = await deps.users.findByEmailWithPassword(email);
  if (!found) {
    deps.logger.warn('auth.login.failed', { ...logMeta, reason: 'user_not_found' });
    throw AuthErrors.invalidCredentials();
  }

  const { user, passwordHash } = found;
  if (!passwordHash) {
    deps.logger.warn('auth.login.failed', { ...logMeta, userId: user.id, reason: 'no_password' });
    throw AuthErrors.invalidCredentials();
  }

  const ok = await deps.passwordHasher.verify(params.password, passwordHash);
  if (!ok) {
    deps.logger.warn('auth.login.failed', {
      ...logMeta,
      userId: user.id,
      reason: 'invalid_password',
    });
    throw AuthErrors.invalidCredentials();
  }

  const organization = user.organizationId
    ? await deps.organizations.findById(user.organizationId)
    : undefined;
  if (!organization) {
    deps.logger.warn('auth.login.failed', { ...logMeta, userId: user.id, reason: 'no_organization' });
    throw AuthErrors.noOrganization();
  }

  const pair = deps.sessions.issueTokenPair(user);

  deps.logger.info('auth.login.success', {
    ...logMeta,
    userId: user.id,
    organizationId: organization.id,
    role: user.role,
  });

  return {
    user: {
      id: user.id,
      email: user.email,
      fullName: user.fullName,
      role: user.role,
    },
    organization: { id: organization.id, name: organization.name },
    accessToken: pair.accessToken,
    refreshToken: pair.refreshToken,
    expiresIn: pair.expiresIn,
    tokenType: pair.tokenType,
  };
}
