/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - RateLimitError → 429 response.
 * - Zod validation errors → 400 (safety net if controller misses).
 * - Fastify body-parser errors (bad JSON) → 400.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log full error details (including REDACTED meta) for observability.
 */

import type { FastifyError, FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'refreshToken',
  'password',
  'passwordHash',
  'secret',
  'authorization',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function isClientFastifyError(err: Error): err is FastifyError {
  if (!('statusCode' in err)) return false;
  const statusCode = err.statusCode;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply
        .status(429)
        .send(buildResponse('RATE_LIMITED', 'Too many requests. Try again later.'));
    }

    // 3) Validation that slipped past a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues });
      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 4) Framework-level client errors (malformed JSON, unsupported media type)
    if (isClientFastifyError(err)) {
      log.warn('client_error', { flow: 'http.error', status: err.statusCode, message: err.message });
      return reply
        .status(err.statusCode ?? 400)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 5) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
