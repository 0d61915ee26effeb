/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. request context (requestId, start time)
 * 2. auth context stub + tenant context slot
 * 3. request log line
 * 4. Bearer session middleware (verified identity + TenantContext)
 *
 * onResponse logs `request.completed` with status and duration.
 *
 * CABLE:
 * - The ws server shares Fastify's HTTP server (`upgrade` event) and is closed
 *   in preClose so open sockets do not hold the HTTP server open.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { elapsedMs, registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerErrorHandler(app);

  app.addHook('onRequest', async (req) => {
    logger.info('request', {
      method: req.method,
      url: req.url.split('?')[0],
      requestId: req.requestContext.requestId,
    });
  });

  app.addHook('onResponse', async (req, reply) => {
    logger.info('request.completed', {
      method: req.method,
      url: req.url.split('?')[0],
      statusCode: reply.statusCode,
      durationMs: elapsedMs(req.requestContext),
      requestId: req.requestContext.requestId,
    });
  });

  registerSessionMiddleware(app, opts.deps.auth.connectionAuthenticator);

  opts.deps.cable.server.attach(app.server);
  app.addHook('preClose', async () => {
    await opts.deps.cable.server.close();
  });

  return app;
}
