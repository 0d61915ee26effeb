/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require authenticated identity" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { UserRole } from '../../modules/users/user.types';
import { AuthErrors } from '../../modules/auth/auth.errors';
import type { TenantContext } from '../tenancy/tenant-context';

export type RequiredAuthContext = Readonly<{
  userId: string;
  organizationId: string;
  role: UserRole;
  tokenId: string;
  tokenExpiresAt: number;
  rawToken: string;
  tenant: TenantContext;
}>;

export type RequireAuthOptions = Readonly<{
  roles?: readonly UserRole[];
}>;

/**
 * Controller guard: requires a verified access token, and optionally a role.
 *
 * Guard sequence:
 * 1) token presented but refused -> typed 401 (TOKEN_EXPIRED / TOKEN_REVOKED / ...)
 * 2) no token at all             -> 401 "Authentication required"
 * 3) wrong role                  -> 403 "Insufficient role."
 */
export function requireAuth(
  req: FastifyRequest,
  opts: RequireAuthOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;

  if (ctx?.failure) {
    throw AuthErrors.fromFailure(ctx.failure);
  }

  if (
    !ctx ||
    !ctx.userId ||
    !ctx.organizationId ||
    !ctx.role ||
    !ctx.tokenId ||
    ctx.tokenExpiresAt === null ||
    !ctx.rawToken ||
    !req.tenantContext
  ) {
    throw AppError.unauthorized('Authentication required');
  }

  if (opts.roles && !opts.roles.includes(ctx.role)) {
    throw AppError.forbidden('Insufficient role.');
  }

  return {
    userId: ctx.userId,
    organizationId: ctx.organizationId,
    role: ctx.role,
    tokenId: ctx.tokenId,
    tokenExpiresAt: ctx.tokenExpiresAt,
    rawToken: ctx.rawToken,
    tenant: req.tenantContext,
  };
}
