/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status to `{ error, errors? }`.
 * - Fastify client errors (bad JSON, wrong content type, body too large) keep their 4xx.
 * - Unexpected errors → 500 with a generic message.
 * - Unknown routes → 404 in the same body shape.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError, type FieldErrors } from './errors';
import { withRequestContext } from '../logger/with-context';

export type ErrorResponseBody = {
  error: string;
  errors?: FieldErrors;
};

export const INTERNAL_ERROR_MESSAGE = 'Internal server error.';

function buildResponse(message: string, fieldErrors?: FieldErrors): ErrorResponseBody {
  return fieldErrors ? { error: message, errors: fieldErrors } : { error: message };
}

function isClientError(err: FastifyError): err is FastifyError & { statusCode: number } {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const logMeta = {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: err.meta,
      };

      if (err.status >= 500) {
        log.error('app_error', { ...logMeta, stack: err.stack });
        return reply.status(500).send(buildResponse(INTERNAL_ERROR_MESSAGE));
      }

      log.warn('app_error', logMeta);
      return reply.status(err.status).send(buildResponse(err.message, err.fieldErrors));
    }

    // 2) Framework-level client errors (malformed JSON, unsupported media type, ...)
    if (isClientError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        code: err.code,
        status: err.statusCode,
        message: err.message,
      });

      return reply.status(err.statusCode).send(buildResponse(err.message));
    }

    // 3) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse(INTERNAL_ERROR_MESSAGE));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.error' });
    return reply.status(404).send(buildResponse('Route not found.'));
  });
}
