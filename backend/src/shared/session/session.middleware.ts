/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Reads `Authorization: Bearer <access token>` on every request.
 * - If the token authenticates, populates req.authContext and opens the request's
 *   TenantContext with the server-derived identity.
 * - Does NOT throw on a missing or refused token. Endpoints decide if auth is
 *   required; requireAuth() turns a recorded failure into its typed 401.
 *
 * RULES:
 * - Runs AFTER the requestContext and authContext hooks (needs both to exist).
 * - Same authentication path as cable connections (ConnectionAuthenticator).
 * - No business logic.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { ConnectionAuthenticator } from '../../modules/auth/connection-authenticator';
import { TenantContext } from '../tenancy/tenant-context';

const BEARER_PREFIX = /^Bearer\s+/i;

export function readBearerToken(header: string | undefined): string | null {
  if (!header || !BEARER_PREFIX.test(header)) return null;
  const token = header.replace(BEARER_PREFIX, '').trim();
  return token || null;
}

export function registerSessionMiddleware(
  app: FastifyInstance,
  authenticator: ConnectionAuthenticator,
): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const token = readBearerToken(req.headers.authorization);
    if (!token) return;

    const result = await authenticator.authenticate(token);
    if (result.status === 'rejected') {
      req.authContext.failure = result.reason;
      return;
    }

    const { identity, claims } = result;
    req.authContext = {
      userId: identity.userId,
      organizationId: identity.organizationId,
      role: identity.role,
      tokenId: claims.tokenId,
      tokenExpiresAt: claims.expiresAt,
      rawToken: token,
      failure: null,
    };
    req.tenantContext = new TenantContext(identity);
  });
}
