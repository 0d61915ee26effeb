/**
 * backend/src/shared/tenancy/tenant-context.ts
 *
 * WHY:
 * - Storage queries must be scoped to the organization of the authenticated
 *   identity. Explicit `organization_id` filters remain mandatory in every query;
 *   this context is a second check layered on top of them.
 * - One context per unit of work (one HTTP request, one cable connection).
 *   It is an explicit object handed to the data layer, never ambient global state,
 *   so two concurrently handled requests cannot observe each other's tenant.
 *
 * LIFECYCLE:
 * - Opened right after authentication succeeds (identity is frozen at that point).
 * - Closed unconditionally when the unit of work ends (response sent, request
 *   aborted, socket closed). A closed context refuses to answer.
 *
 * HOW TO USE:
 * - HTTP: session middleware opens it on req.tenantContext; auth-context closes it.
 * - Cable: the connection opens it on authentication and closes it on disconnect.
 * - Ad-hoc work: `await withTenantContext(identity, async (tenant) => { ... })`.
 */

import type { UserRole } from '../../modules/users/user.types';
import { TenantErrors } from './tenant.errors';

export type TenantIdentity = Readonly<{
  organizationId: string;
  userId: string;
  role: UserRole;
}>;

export class TenantContext {
  private readonly identity: TenantIdentity;
  private open = true;

  constructor(identity: TenantIdentity) {
    this.identity = Object.freeze({ ...identity });
  }

  get isOpen(): boolean {
    return this.open;
  }

  /** Returns the bound identity; throws once the unit of work has ended. */
  current(): TenantIdentity {
    if (!this.open) {
      throw TenantErrors.contextClosed({ userId: this.identity.userId });
    }
    return this.identity;
  }

  get organizationId(): string {
    return this.current().organizationId;
  }

  get userId(): string {
    return this.current().userId;
  }

  get role(): UserRole {
    return this.current().role;
  }

  /**
   * Defense-in-depth check for storage writes/reads: the row's organization
   * must be the context's organization.
   */
  assertOwns(organizationId: string): void {
    const identity = this.current();
    if (identity.organizationId !== organizationId) {
      throw TenantErrors.crossTenantAccess({
        contextOrganizationId: identity.organizationId,
        targetOrganizationId: organizationId,
      });
    }
  }

  /** Idempotent. */
  close(): void {
    this.open = false;
  }
}

export async function withTenantContext<T>(
  identity: TenantIdentity,
  work: (tenant: TenantContext) => Promise<T>,
): Promise<T> {
  const tenant = new TenantContext(identity);
  try {
    return await work(tenant);
  } finally {
    tenant.close();
  }
}
