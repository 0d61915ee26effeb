import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';

import { emptyAuthContext, type AuthContext } from '../../../../src/shared/http/auth-context';
import { AppError } from '../../../../src/shared/http/errors';
import { requireAuth } from '../../../../src/shared/http/require-auth-context';
import { TenantContext } from '../../../../src/shared/tenancy/tenant-context';

function makeReq(authContext: AuthContext, tenantContext: TenantContext | null = null): FastifyRequest {
  return { authContext, tenantContext } as unknown as FastifyRequest;
}

function thrown(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected an AppError');
}

const authenticated: AuthContext = {
  userId: 'user-1',
  organizationId: 'org-1',
  role: 'viewer',
  tokenId: 'jti-1',
  tokenExpiresAt: 1_700_000_900,
  rawToken: 'raw',
  failure: null,
};

const tenant = () => new TenantContext({ userId: 'user-1', organizationId: 'org-1', role: 'viewer' });

describe('requireAuth', () => {
  it('throws 401 when no token was presented', () => {
    const e = thrown(() => requireAuth(makeReq(emptyAuthContext())));

    expect(e.status).toBe(401);
    expect(e.code).toBe('UNAUTHORIZED');
    expect(e.message).toBe('Authentication required');
  });

  it('throws the typed error recorded by the session middleware', () => {
    const e = thrown(() =>
      requireAuth(makeReq({ ...emptyAuthContext(), failure: 'token_expired' })),
    );

    expect(e.status).toBe(401);
    expect(e.code).toBe('TOKEN_EXPIRED');
  });

  it('maps a revoked token to TOKEN_REVOKED and a missing user to USER_NOT_FOUND', () => {
    expect(
      thrown(() => requireAuth(makeReq({ ...emptyAuthContext(), failure: 'token_revoked' }))).code,
    ).toBe('TOKEN_REVOKED');
    expect(
      thrown(() => requireAuth(makeReq({ ...emptyAuthContext(), failure: 'user_not_found' }))).code,
    ).toBe('USER_NOT_FOUND');
  });

  it('throws 403 when the role requirement is not met', () => {
    const e = thrown(() => requireAuth(makeReq(authenticated, tenant()), { roles: ['owner', 'admin'] }));

    expect(e.status).toBe(403);
    expect(e.message).toBe('Insufficient role.');
  });

  it('returns the identity with its tenant context', () => {
    const ctx = tenant();

    const auth = requireAuth(makeReq(authenticated, ctx), { roles: ['viewer'] });

    expect(auth.userId).toBe('user-1');
    expect(auth.organizationId).toBe('org-1');
    expect(auth.tenant).toBe(ctx);
  });
});
