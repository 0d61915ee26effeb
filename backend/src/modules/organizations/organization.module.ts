/**
 * backend/src/modules/organizations/organization.module.ts
 *
 * WHY:
 * - Support module (no routes). Login and connection authentication check that
 *   the caller's organization still exists.
 */

import type { DbExecutor } from '../../shared/db/db';
import { KyselyOrganizationStore } from './organization.store';
import type { OrganizationStore } from './organization.store';

export type OrganizationModule = ReturnType<typeof createOrganizationModule>;

export function createOrganizationModule(deps: {
  db: DbExecutor;
  organizationStore?: OrganizationStore;
}) {
  const organizationStore: OrganizationStore =
    deps.organizationStore ?? new KyselyOrganizationStore(deps.db);

  return {
    organizationStore,
  };
}
