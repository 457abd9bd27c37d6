/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = buildDeps(config, overrides);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  if (!deps.tokenValidator.hasConfiguredTokens) {
    logger.warn('auth.no_tokens_configured', {
      flow: 'startup',
      hint: 'Set AUTH_TOKEN or AUTH_TOKENS; every /api request will be rejected with 401.',
    });
  }

  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
