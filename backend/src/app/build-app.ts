/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, type DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = await buildDeps(config, overrides);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
