/**
 * backend/src/shared/tenancy/tenant.errors.ts
 *
 * WHY:
 * - Tenant-scope violations are programming errors (a store was handed data for
 *   another organization, or a context was used after its unit of work ended).
 * - They surface as 500/403 and are always logged; clients get no details.
 */

import { AppError, type AppErrorMeta } from '../http/errors';

export const TenantErrors = {
  contextClosed(meta?: AppErrorMeta) {
    return AppError.internal('Tenant context is no longer active.', meta);
  },

  crossTenantAccess(meta?: AppErrorMeta) {
    return AppError.forbidden('Cross-tenant access denied.', meta);
  },
} as const;
