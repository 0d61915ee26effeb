import type { DbExecutor } from '../../shared/db/db';
import { selectOrganizationByIdSql } from './dal/organization.query-sql';
import type { Organization } from './organization.types';

export interface OrganizationStore {
  findById(id: string): Promise<Organization | undefined>;
}

export class KyselyOrganizationStore implements OrganizationStore {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<Organization | undefined> {
    const row = await selectOrganizationByIdSql(this.db, id);
    if (!row) return undefined;
    return { id: row.id, name: row.name };
  }
}
