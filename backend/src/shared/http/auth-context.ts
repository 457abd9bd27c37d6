/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Every API request must carry a shared bearer token.
 * - One hook guards all routes so no endpoint can forget the check.
 *
 * HOW IT WORKS:
 * 1. registerTokenAuth() sets `req.authContext = { authenticated: false }` on every request.
 * 2. Public paths (docs, health) pass through untouched.
 * 3. Otherwise the Authorization header is checked against the TokenValidator;
 *    a missing or unknown token throws AppError.unauthorized() -> 401.
 *
 * RULES:
 * - Never log the presented token.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { TokenValidator } from '../security/token-validator';

export type AuthContext = {
  authenticated: boolean;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

const BEARER_PREFIX = 'bearer ';

/**
 * Reads the credential from an Authorization header value.
 *
 * "Bearer abc" (any casing of the scheme) -> "abc"; any other value is taken
 * as the token itself. Returns null when nothing usable is present.
 */
export function extractBearerToken(header: string | string[] | undefined): string | null {
  const raw = Array.isArray(header) ? header[0] : header;
  if (!raw) return null;

  const token = raw.toLowerCase().startsWith(BEARER_PREFIX)
    ? raw.slice(BEARER_PREFIX.length).trim()
    : raw.trim();

  return token || null;
}

export function isPublicPath(url: string): boolean {
  const path = url.split('?')[0] ?? url;
  return path === '/' || path === '/health' || path === '/docs' || path.startsWith('/docs/');
}

export function registerTokenAuth(
  app: FastifyInstance,
  opts: { tokenValidator: TokenValidator },
) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', async (req: FastifyRequest) => {
    req.authContext = { authenticated: false };

    if (isPublicPath(req.url)) return;

    const token = extractBearerToken(req.headers.authorization);
    if (!opts.tokenValidator.isValid(token)) {
      throw AppError.unauthorized({ reason: token ? 'invalid_token' : 'missing_token' });
    }

    req.authContext = { authenticated: true };
  });
}
