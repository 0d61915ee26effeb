/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 * - Soft-deleted users are filtered here so no caller can authenticate them.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';

export type UserRow = Selectable<UsersTable>;

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('id', '=', userId)
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}
