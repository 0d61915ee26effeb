/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const AUTH_RATE_LIMITS = {
  login: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  refresh: {
    perIp: { limit: 30, windowSeconds: 900 },
  },
} as const;

export const TOKEN_DEFAULTS = {
  accessTtlSeconds: 24 * 60 * 60,
  refreshTtlSeconds: 7 * 24 * 60 * 60,
} as const;

export const REVOCATION_KEY_PREFIX = 'revoked:jti';
