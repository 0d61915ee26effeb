/**
 * backend/src/modules/users/user.store.ts
 *
 * WHY:
 * - UserStore is the only contract the auth/cable core uses to read users.
 * - The core never owns the users table; it only resolves identities.
 *
 * RULES:
 * - Lookups always hit the store (no caching): a user removed from an
 *   organization must stop being resolvable immediately.
 */

import type { DbExecutor } from '../../shared/db/db';
import { getUserById, getUserWithPasswordByEmail } from './queries/user.queries';
import type { User, UserWithPassword } from './user.types';

export interface UserStore {
  findById(id: string): Promise<User | undefined>;
  findByEmailWithPassword(email: string): Promise<UserWithPassword | undefined>;
}

export class KyselyUserStore implements UserStore {
  constructor(private readonly db: DbExecutor) {}

  findById(id: string): Promise<User | undefined> {
    return getUserById(this.db, id);
  }

  findByEmailWithPassword(email: string): Promise<UserWithPassword | undefined> {
    return getUserWithPasswordByEmail(this.db, email);
  }
}
