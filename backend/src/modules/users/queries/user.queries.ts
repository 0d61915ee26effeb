/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 * - An unknown role string maps to 'viewer' (least privilege).
 */

import type { DbExecutor } from '../../../shared/db/db';
import { selectUserByEmailSql, selectUserByIdSql } from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import { isUserRole } from '../user.types';
import type { User, UserWithPassword } from '../user.types';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    organizationId: row.organization_id ?? null,
    role: isUserRole(row.role) ? row.role : 'viewer',
    email: row.email,
    fullName: row.full_name ?? null,
  };
}

export async function getUserById(db: DbExecutor, userId: string): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserWithPasswordByEmail(
  db: DbExecutor,
  email: string,
): Promise<UserWithPassword | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return { user: toUser(row), passwordHash: row.password_digest ?? null };
}
