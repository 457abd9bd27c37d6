/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 * - Services accept an AbortSignal; the request owns it so work for a client
 *   that already went away can be abandoned.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - The signal aborts only when the response closes before it was fully written.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'x-request-id';

export type RequestContext = {
  requestId: string;
  signal: AbortSignal;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

function bindAbortSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();

  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('Client closed request'));
    }
  });

  return controller.signal;
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // We'll assign the real value on each request in the onRequest hook.
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply: FastifyReply, done) => {
    const requestId = randomUUID();

    req.requestContext = {
      requestId,
      signal: bindAbortSignal(reply),
    };

    reply.header(REQUEST_ID_HEADER, requestId);

    done();
  });
}
