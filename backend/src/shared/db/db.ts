/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table shapes live in ./schema.ts (the subset of the relational model this
 *   service reads and writes: users, organizations, messages).
 *
 * NOTE:
 * - pg.Pool connects lazily (first query), so building the app never blocks on Postgres.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both main DB and transactions.
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
