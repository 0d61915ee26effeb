/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Token failures are typed so clients can choose between
 *   "refresh and retry" (TOKEN_EXPIRED), "force re-login" (TOKEN_REVOKED,
 *   TOKEN_INVALID, USER_NOT_FOUND) and "show an error".
 * - Security-safe: login errors never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { AuthFailureReason } from './auth.types';

export const AuthErrors = {
  tokenExpired(meta?: AppErrorMeta) {
    return new AppError({ code: 'TOKEN_EXPIRED', status: 401, message: 'Token has expired.', meta });
  },

  tokenRevoked(meta?: AppErrorMeta) {
    return new AppError({
      code: 'TOKEN_REVOKED',
      status: 401,
      message: 'Token has been revoked.',
      meta,
    });
  },

  tokenInvalid(message = 'Invalid token.', meta?: AppErrorMeta) {
    return new AppError({ code: 'TOKEN_INVALID', status: 401, message, meta });
  },

  /** A structurally valid token presented for an operation of the other type. */
  wrongTokenType(meta?: AppErrorMeta) {
    return AuthErrors.tokenInvalid('Token type is not valid for this operation.', meta);
  },

  userNotFound(meta?: AppErrorMeta) {
    return new AppError({ code: 'USER_NOT_FOUND', status: 401, message: 'User not found.', meta });
  },

  /** Login: wrong email or password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password.', meta);
  },

  noOrganization(meta?: AppErrorMeta) {
    return AppError.forbidden('Your account is not attached to an organization.', meta);
  },

  missingToken(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required', meta);
  },

  /** Maps an authenticator rejection to the HTTP error a client sees. */
  fromFailure(reason: AuthFailureReason, meta?: AppErrorMeta): AppError {
    switch (reason) {
      case 'token_missing':
        return AuthErrors.missingToken(meta);
      case 'token_expired':
        return AuthErrors.tokenExpired(meta);
      case 'token_revoked':
        return AuthErrors.tokenRevoked(meta);
      case 'token_invalid':
        return AuthErrors.tokenInvalid(undefined, meta);
      case 'wrong_token_type':
        return AuthErrors.wrongTokenType(meta);
      case 'user_not_found':
        return AuthErrors.userNotFound(meta);
      case 'no_organization':
        return AuthErrors.noOrganization(meta);
    }
  },
} as const;
