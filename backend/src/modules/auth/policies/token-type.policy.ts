/**
 * backend/src/modules/auth/policies/token-type.policy.ts
 *
 * WHY:
 * - Verification never checks what a token is FOR. Each operation states which
 *   token type it accepts and checks it here.
 *
 * RULES:
 * - Pure function. No IO.
 * - Refresh tokens never open interactive sessions (HTTP Bearer or cable).
 */

import type { SessionClaims, TokenType } from '../auth.types';

export function isTokenType(claims: Pick<SessionClaims, 'tokenType'>, expected: TokenType): boolean {
  return claims.tokenType === expected;
}
