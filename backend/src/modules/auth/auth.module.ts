/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring: token codec, revocation store, sessions,
 *   the connection authenticator and the HTTP endpoints.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Cache } from '../../shared/cache/cache';
import type { Logger } from '../../shared/logger/logger';
import type { KeyHasher } from '../../shared/security/key-hasher';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { Clock } from '../../shared/time/clock';
import type { OrganizationStore } from '../organizations/organization.store';
import type { UserStore } from '../users/user.store';

import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';
import { AuthService } from './auth.service';
import { ConnectionAuthenticator } from './connection-authenticator';
import { CacheRevocationStore } from './session/revocation.store';
import { SessionService } from './session/session.service';
import { TokenCodec } from './session/token-codec';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  cache: Cache;
  clock: Clock;
  users: UserStore;
  organizations: OrganizationStore;
  passwordHasher: PasswordHasher;
  keyHasher: KeyHasher;
  rateLimiter: RateLimiter;
  logger: Logger;
  jwt: {
    secret: string;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
  };
}) {
  const codec = new TokenCodec({
    secret: deps.jwt.secret,
    defaultTtlSeconds: deps.jwt.accessTtlSeconds,
    clock: deps.clock,
  });
  const revocations = new CacheRevocationStore(deps.cache, deps.clock);

  const sessionService = new SessionService({
    codec,
    revocations,
    users: deps.users,
    accessTtlSeconds: deps.jwt.accessTtlSeconds,
    refreshTtlSeconds: deps.jwt.refreshTtlSeconds,
  });

  const connectionAuthenticator = new ConnectionAuthenticator({
    sessions: sessionService,
    users: deps.users,
    organizations: deps.organizations,
  });

  const authService = new AuthService({
    users: deps.users,
    organizations: deps.organizations,
    sessions: sessionService,
    passwordHasher: deps.passwordHasher,
    keyHasher: deps.keyHasher,
    rateLimiter: deps.rateLimiter,
    logger: deps.logger,
  });

  const controller = new AuthController(authService);

  return {
    tokenCodec: codec,
    sessionService,
    connectionAuthenticator,
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
