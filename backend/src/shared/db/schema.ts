/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs the table shapes to type queries.
 * - Only the columns this service touches are declared; the tables themselves are
 *   owned by the domain CRUD layer (rosters, scrims, scouting...).
 *
 * RULES:
 * - snake_case here only; DAL/queries map rows to camelCase domain types.
 * - `deleted_at` marks soft-deleted rows; queries treat them as absent.
 */

import type { Generated } from 'kysely';

export interface UsersTable {
  id: Generated<string>;
  organization_id: string | null;
  email: string;
  full_name: string | null;
  role: string;
  password_digest: string | null;
  deleted_at: Date | null;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface OrganizationsTable {
  id: Generated<string>;
  name: string;
  deleted_at: Date | null;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface MessagesTable {
  id: Generated<string>;
  user_id: string;
  recipient_id: string | null;
  organization_id: string;
  content: string;
  deleted: Generated<boolean>;
  deleted_at: Date | null;
  created_at: Generated<Date>;
  updated_at: Generated<Date>;
}

export interface DB {
  users: UsersTable;
  organizations: OrganizationsTable;
  messages: MessagesTable;
}
