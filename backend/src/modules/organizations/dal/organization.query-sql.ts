/**
 * backend/src/modules/organizations/dal/organization.query-sql.ts
 *
 * RULES:
 * - DAL reads only. Soft-deleted organizations are treated as absent.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { OrganizationsTable } from '../../../shared/db/schema';

export type OrganizationRow = Selectable<OrganizationsTable>;

export async function selectOrganizationByIdSql(
  db: DbExecutor,
  organizationId: string,
): Promise<OrganizationRow | undefined> {
  return db
    .selectFrom('organizations')
    .selectAll()
    .where('id', '=', organizationId)
    .where('deleted_at', 'is', null)
    .executeTakeFirst();
}
