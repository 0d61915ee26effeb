/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs should carry the requestId (HTTP) or connectionId (cable) plus the
 *   authenticated identity, so a full request or connection can be traced.
 * - We don't want every handler repeating the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).info('msg', { flow: '...' })`
 * - In a cable connection: `withConnectionContext({ connectionId, userId, organizationId })`
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

type LogMeta = Record<string, unknown>;

export type ContextLogger = {
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  debug: (msg: string, meta?: LogMeta) => void;
};

export function withContext(base: LogMeta): ContextLogger {
  return {
    info: (msg, meta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg, meta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg, meta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg, meta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}

export function withRequestContext(req: FastifyRequest): ContextLogger {
  return withContext({
    requestId: req.requestContext?.requestId,
    userId: req.authContext?.userId ?? null,
    organizationId: req.authContext?.organizationId ?? null,
    role: req.authContext?.role ?? null,
  });
}

export function withConnectionContext(ctx: {
  connectionId: string;
  userId: string;
  organizationId: string;
}): ContextLogger {
  return withContext({
    connectionId: ctx.connectionId,
    userId: ctx.userId,
    organizationId: ctx.organizationId,
  });
}
