/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication and access are separate concepts.
 * - The session middleware populates this from a verified Bearer access token.
 * - Without a valid token, all fields are null (unauthenticated request).
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets stub (all null) on every request.
 * 2. Session middleware overwrites with the verified identity and opens the
 *    request's TenantContext.
 * 3. The TenantContext is closed in onResponse / onRequestAbort, whatever the outcome.
 * 4. Controllers read req.authContext via requireAuth().
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { UserRole } from '../../modules/users/user.types';
import type { AuthFailureReason } from '../../modules/auth/auth.types';
import type { TenantContext } from '../tenancy/tenant-context';

export type AuthContext = {
  userId: string | null;
  organizationId: string | null;
  role: UserRole | null;

  // The access token that authenticated this request (needed by logout).
  tokenId: string | null;
  tokenExpiresAt: number | null;
  rawToken: string | null;

  // Why a presented token was refused (null when none was presented).
  failure: AuthFailureReason | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
    tenantContext: TenantContext | null;
  }
}

export function emptyAuthContext(): AuthContext {
  return {
    userId: null,
    organizationId: null,
    role: null,
    tokenId: null,
    tokenExpiresAt: null,
    rawToken: null,
    failure: null,
  };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);
  app.decorateRequest('tenantContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = emptyAuthContext();
    req.tenantContext = null;
    done();
  });

  const closeTenantContext = (req: FastifyRequest, _reply: unknown, done: () => void) => {
    req.tenantContext?.close();
    done();
  };

  app.addHook('onResponse', closeTenantContext);
  app.addHook('onRequestAbort', (req: FastifyRequest, done) => {
    req.tenantContext?.close();
    done();
  });
}
