import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import type { DepsOverrides } from '../../src/app/di';
import type { Clock } from '../../src/shared/time/clock';

export const TEST_TOKEN = 'test-token';

export const authHeaders = { authorization: `Bearer ${TEST_TOKEN}` } as const;

/**
 * A clock that moves forward by `stepMs` on every read, so two timestamps
 * taken in the same test are always strictly ordered.
 */
export function createSteppingClock(start = new Date('2026-01-01T00:00:00.000Z'), stepMs = 1000) {
  let current = start.getTime();

  const clock: Clock = () => {
    const now = new Date(current);
    current += stepMs;
    return now;
  };

  return clock;
}

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Docs are OFF by default (enable per test when needed).
 * - A single known token is accepted: TEST_TOKEN.
 */
export async function buildTestApp(
  overrides: Partial<AppConfig> = {},
  depsOverrides: DepsOverrides = {},
) {
  const baseConfig: AppConfig = {
    nodeEnv: 'test',
    port: 0,
    host: '127.0.0.1',

    logLevel: process.env.LOG_LEVEL ?? 'error',
    serviceName: process.env.SERVICE_NAME ?? 'user-directory-api-test',

    auth: {
      token: TEST_TOKEN,
      tokens: [],
    },

    docs: {
      enabled: false,
    },
  };

  const config: AppConfig = {
    ...baseConfig,
    ...overrides,
    // ensure nested objects merge correctly
    auth: {
      ...baseConfig.auth,
      ...(overrides.auth ?? {}),
    },
    docs: {
      ...baseConfig.docs,
      ...(overrides.docs ?? {}),
    },
  };

  const built = await buildApp(config, {
    clock: createSteppingClock(),
    ...depsOverrides,
  });

  return {
    app: built.app,
    deps: built.deps,
    close: built.close,
  };
}
