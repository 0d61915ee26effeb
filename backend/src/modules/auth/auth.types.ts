/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Domain types for sessions: signed token claims, token pairs, identities.
 * - A token is a capability snapshot: its claims are never re-validated against
 *   live data at verification time. Only `tokenId` is checked (revocation) and
 *   `tokenType` must be checked by each caller for its own operation.
 *
 * RULES:
 * - Timestamps are second-granularity epoch integers.
 * - Never include raw passwords or hashes in any type here.
 */

import type { UserRole } from '../users/user.types';

export type TokenType = 'access' | 'refresh';

export type SessionClaims = {
  subject: string;
  organizationId: string | null;
  role: UserRole | null;
  tokenType: TokenType;
  issuedAt: number;
  expiresAt: number;
  tokenId: string;
};

/** What a caller hands to TokenCodec.encode (the codec stamps the rest). */
export type ClaimsInput = {
  subject: string;
  organizationId: string | null;
  role: UserRole | null;
  tokenType: TokenType;
  tokenId?: string;
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  /** Access token lifetime in seconds. */
  expiresIn: number;
  tokenType: 'Bearer';
};

/**
 * Verified `{user, organization, role}` attached to one request or connection.
 * Derived server-side from a verified token + live user lookup; never client-declared.
 */
export type Identity = Readonly<{
  userId: string;
  organizationId: string;
  role: UserRole;
}>;

/** Display details of the authenticated user, shown to other members as message sender. */
export type UserSummary = Readonly<{
  id: string;
  fullName: string | null;
  role: UserRole;
}>;

export const AUTH_FAILURE_REASONS = [
  'token_missing',
  'token_expired',
  'token_revoked',
  'token_invalid',
  'wrong_token_type',
  'user_not_found',
  'no_organization',
] as const;

export type AuthFailureReason = (typeof AUTH_FAILURE_REASONS)[number];

export type AuthResult = {
  user: {
    id: string;
    email: string;
    fullName: string | null;
    role: UserRole;
  };
  organization: {
    id: string;
    name: string;
  };
} & TokenPair;
