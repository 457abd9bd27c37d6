/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * AUTH TOKENS:
 * - AUTH_TOKEN (single) and AUTH_TOKENS (comma-separated) are both optional.
 * - They are combined, trimmed and deduplicated by the token validator, not here.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const TokenListSchema = z
  .string()
  .optional()
  .transform((raw) => (raw ? raw.split(',') : []));

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('user-directory-api'),

  // Bearer authentication
  AUTH_TOKEN: z.string().optional(),
  AUTH_TOKENS: TokenListSchema,

  // OpenAPI docs (/docs)
  DOCS_ENABLED: BooleanFlagSchema.default('true'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  host: string;

  logLevel: string;
  serviceName: string;

  auth: {
    token: string | null;
    tokens: string[];
  };

  docs: {
    enabled: boolean;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    auth: {
      token: parsed.AUTH_TOKEN ?? null,
      tokens: parsed.AUTH_TOKENS,
    },

    docs: {
      enabled: parsed.DOCS_ENABLED,
    },
  };
}
