/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. request context (requestId + abort signal)
 * 2. request logging
 * 3. bearer token auth (401 before any handler runs)
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerDocs } from './docs';
import { registerRequestContext } from '../shared/http/request-context';
import { registerTokenAuth } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { withRequestContext } from '../shared/logger/with-context';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);

  app.addHook('onRequest', (req, _reply, done) => {
    withRequestContext(req).info('request');
    done();
  });

  registerTokenAuth(app, { tokenValidator: opts.deps.tokenValidator });
  registerErrorHandler(app);

  app.addHook('onResponse', (req, reply, done) => {
    withRequestContext(req).info('request.completed', {
      statusCode: reply.statusCode,
      elapsedMs: Math.round(reply.elapsedTime),
    });
    done();
  });

  if (opts.config.docs.enabled) {
    await registerDocs(app);
  }

  return app;
}
