/**
 * backend/src/app/docs.ts
 *
 * WHY:
 * - Serves the OpenAPI document + UI at /docs (public, no token needed).
 * - Must be registered BEFORE module routes so @fastify/swagger sees them.
 */

import type { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

export const DOCS_PREFIX = '/docs';

export async function registerDocs(app: FastifyInstance): Promise<void> {
  await app.register(swagger, {
    // Only module routes (which carry tags) are documented.
    hideUntagged: true,
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'User Management API',
        version: 'v1',
      },
      components: {
        securitySchemes: {
          bearerAuth: { type: 'http', scheme: 'bearer' },
        },
      },
    },
  });

  await app.register(swaggerUi, { routePrefix: DOCS_PREFIX });

  app.get('/', { schema: { hide: true } }, (_req, reply) => reply.redirect(DOCS_PREFIX));
}
