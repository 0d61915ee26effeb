/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - A user belongs to at most one organization (the tenant).
 *   A user without an organization cannot open sessions or connections.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - Password hashes never leave UserWithPassword (login flow only).
 */

export const USER_ROLES = ['owner', 'admin', 'coach', 'analyst', 'viewer'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export type UserId = string;

export type User = {
  id: UserId;
  organizationId: string | null;
  role: UserRole;
  email: string;
  fullName: string | null;
};

export type UserWithPassword = {
  user: User;
  passwordHash: string | null;
};

export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}
