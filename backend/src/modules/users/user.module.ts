/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in, including the store).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';

import type { UserRepo } from './dal/user.repo';
import { UserController } from './user.controller';
import { UserService } from './user.service';
import { registerUserRoutes } from './user.routes';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { userRepo: UserRepo; logger: Logger; clock: Clock }) {
  const userService = new UserService({
    userRepo: deps.userRepo,
    logger: deps.logger,
    clock: deps.clock,
  });

  const controller = new UserController(userService);

  return {
    registerRoutes(app: FastifyInstance) {
      registerUserRoutes(app, controller);
    },
  };
}
