/**
 * backend/src/modules/organizations/organization.types.ts
 *
 * WHY:
 * - An organization is the tenant: the unit of data isolation.
 */

export type OrganizationId = string;

export type Organization = {
  id: OrganizationId;
  name: string;
};
