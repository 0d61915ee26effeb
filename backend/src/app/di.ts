/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Tests inject in-memory stand-ins through `overrides` (cache, stores, clock).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import { Sha256KeyHasher } from '../shared/security/key-hasher';
import type { KeyHasher } from '../shared/security/key-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import type { PasswordHasher } from '../shared/security/password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';
import { systemClock } from '../shared/time/clock';
import type { Clock } from '../shared/time/clock';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';
import type { UserStore } from '../modules/users/user.store';

import { createOrganizationModule } from '../modules/organizations/organization.module';
import type { OrganizationModule } from '../modules/organizations/organization.module';
import type { OrganizationStore } from '../modules/organizations/organization.store';

import { createMessageModule } from '../modules/messages/message.module';
import type { MessageModule } from '../modules/messages/message.module';
import type { MessageStore } from '../modules/messages/message.store';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

import { createCableModule } from '../modules/cable/cable.module';
import type { CableModule } from '../modules/cable/cable.module';

export type DepsOverrides = {
  cache?: Cache;
  clock?: Clock;
  passwordHasher?: PasswordHasher;
  userStore?: UserStore;
  organizationStore?: OrganizationStore;
  messageStore?: MessageStore;
  rateLimitsDisabled?: boolean;
};

export type AppDeps = {
  db: Db;
  cache: Cache;
  clock: Clock;

  logger: Logger;

  rateLimiter: RateLimiter;
  keyHasher: KeyHasher;
  passwordHasher: PasswordHasher;

  // modules
  users: UserModule;
  organizations: OrganizationModule;
  messages: MessageModule;
  auth: AuthModule;
  cable: CableModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const db = createDb(config.databaseUrl);

  // Redis is mandatory outside tests; an injected cache is owned by the caller.
  let redis: RedisCache | null = null;
  let cache: Cache;
  if (overrides.cache) {
    cache = overrides.cache;
  } else {
    redis = await RedisCache.connect(config.redisUrl);
    cache = redis;
  }

  const clock = overrides.clock ?? systemClock;

  const keyHasher: KeyHasher = new Sha256KeyHasher();
  const passwordHasher: PasswordHasher =
    overrides.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });

  // Composition root decides when rate limiting is disabled.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: overrides.rateLimitsDisabled ?? config.nodeEnv === 'test',
  });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db, userStore: overrides.userStore });
  const organizations = createOrganizationModule({
    db,
    organizationStore: overrides.organizationStore,
  });
  const messages = createMessageModule({ db, messageStore: overrides.messageStore });

  const auth = createAuthModule({
    cache,
    clock,
    users: users.userStore,
    organizations: organizations.organizationStore,
    passwordHasher,
    keyHasher,
    rateLimiter,
    logger,
    jwt: config.jwt,
  });

  const cable = createCableModule({
    path: config.cable.path,
    maxPayloadBytes: config.cable.maxPayloadBytes,
    authenticator: auth.connectionAuthenticator,
    users: users.userStore,
    messages: messages.messageStore,
    logger,
  });

  return {
    db,
    cache,
    clock,
    logger,
    rateLimiter,
    keyHasher,
    passwordHasher,
    users,
    organizations,
    messages,
    auth,
    cable,
    close: async () => {
      if (redis) await redis.close();
      await db.destroy();
    },
  };
}
