/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all HTTP routes:
 *   - core routes (/health)
 *   - module routes (auth)
 * - The cable endpoint is not a Fastify route; it is attached in server.ts.
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  // Module routes
  opts.deps.auth.registerRoutes(app);
}
