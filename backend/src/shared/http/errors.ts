/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. auth/auth.errors.ts).
 *
 * TOKEN CODES:
 * - TOKEN_EXPIRED  → client may refresh silently and retry.
 * - TOKEN_REVOKED  → client must sign in again.
 * - TOKEN_INVALID  → malformed, bad signature, or wrong token type for the operation.
 * - USER_NOT_FOUND → the token's subject no longer exists.
 */

export const APP_ERROR_CODES = [
  'UNAUTHORIZED',
  'FORBIDDEN',
  'VALIDATION_ERROR',
  'RATE_LIMITED',
  'INTERNAL',
  'TOKEN_EXPIRED',
  'TOKEN_REVOKED',
  'TOKEN_INVALID',
  'USER_NOT_FOUND',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; status: number; meta?: AppErrorMeta }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAUTHORIZED', status: 401, message, meta });
  }

  static forbidden(message = 'Forbidden', meta?: AppErrorMeta) {
    return new AppError({ code: 'FORBIDDEN', status: 403, message, meta });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, meta });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta) {
    return new AppError({ code: 'INTERNAL', status: 500, message, meta });
  }
}
