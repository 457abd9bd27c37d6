/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates shared infra ONCE (store, token validator) and hands it to modules.
 * - Keeps modules testable: tests can inject a clock or a different store.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import type { TokenValidator } from '../shared/security/token-validator';
import { StaticTokenValidator } from '../shared/security/static-token-validator';

import { systemClock } from '../shared/time/clock';
import type { Clock } from '../shared/time/clock';

import { createUserModule, InMemUserRepo } from '../modules/users';
import type { UserModule, UserRepo } from '../modules/users';

export type AppDeps = {
  logger: Logger;
  clock: Clock;

  tokenValidator: TokenValidator;
  userRepo: UserRepo;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  clock?: Clock;
  userRepo?: UserRepo;
  tokenValidator?: TokenValidator;
};

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  const clock = overrides.clock ?? systemClock;

  const tokenValidator: TokenValidator =
    overrides.tokenValidator ?? StaticTokenValidator.fromConfig(config.auth);

  // Process-lifetime store: constructed once, nothing to tear down.
  const userRepo: UserRepo = overrides.userRepo ?? new InMemUserRepo();

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ userRepo, logger, clock });

  return {
    logger,
    clock,
    tokenValidator,
    userRepo,
    users,
    close: () => Promise.resolve(),
  };
}
