/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Every request gets a stable requestId for logs and error reports.
 * - Tenant scope is NOT derived from the request (host, headers, params):
 *   it comes only from a verified access token (see session.middleware.ts).
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  /** Epoch ms when onRequest ran; used for the completion log. */
  startedAt: number;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function elapsedMs(ctx: RequestContext, now: number = Date.now()): number {
  return Math.max(0, now - ctx.startedAt);
}

export function registerRequestContext(app: FastifyInstance) {
  app.decorateRequest('requestContext', null);

  // Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = {
      requestId: randomUUID(),
      startedAt: Date.now(),
    };

    done();
  });
}
