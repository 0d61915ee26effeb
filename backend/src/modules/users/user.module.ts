/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Support module (no routes of its own). Auth and cable consume its store.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - A ready-made store may be injected (tests use an in-memory one).
 */

import type { DbExecutor } from '../../shared/db/db';
import { KyselyUserStore } from './user.store';
import type { UserStore } from './user.store';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { db: DbExecutor; userStore?: UserStore }) {
  const userStore: UserStore = deps.userStore ?? new KyselyUserStore(deps.db);

  return {
    userStore,
  };
}
