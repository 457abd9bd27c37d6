/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Orchestrates user CRUD end-to-end.
 * - Turns repository outcomes (return values) into domain errors.
 *
 * RULES:
 * - No HTTP here (controllers map requests/responses).
 * - Inputs arrive validated and trimmed (see user.schemas.ts).
 * - emailExists() is advisory only; the repo re-checks uniqueness when committing.
 * - Never log full records; ids are enough to trace.
 */

import { randomUUID } from 'node:crypto';

import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';

import type { RepoCallOptions, UserRepo } from './dal/user.repo';
import type { User, UserId } from './user.types';
import { UserErrors } from './user.errors';

export type UserInput = {
  email: string;
  fullName: string;
};

export type UserCallContext = {
  requestId?: string;
  signal?: AbortSignal;
};

export class UserService {
  constructor(
    private readonly deps: {
      userRepo: UserRepo;
      logger: Logger;
      clock: Clock;
      generateId?: () => UserId;
    },
  ) {}

  private repoOpts(ctx: UserCallContext): RepoCallOptions {
    return { signal: ctx.signal };
  }

  async listUsers(ctx: UserCallContext = {}): Promise<User[]> {
    return this.deps.userRepo.list(this.repoOpts(ctx));
  }

  async getUser(id: UserId, ctx: UserCallContext = {}): Promise<User> {
    const user = await this.deps.userRepo.get(id, this.repoOpts(ctx));
    if (!user) throw UserErrors.userNotFound(id);
    return user;
  }

  async createUser(input: UserInput, ctx: UserCallContext = {}): Promise<User> {
    const flow = 'users.create';
    const opts = this.repoOpts(ctx);

    if (await this.deps.userRepo.emailExists(input.email, null, opts)) {
      throw UserErrors.emailTaken(input.email, { flow });
    }

    const user: User = {
      id: this.deps.generateId ? this.deps.generateId() : randomUUID(),
      email: input.email,
      fullName: input.fullName,
      createdAt: this.deps.clock(),
      updatedAt: null,
    };

    const result = await this.deps.userRepo.create(user, opts);

    if (!result.ok) {
      if (result.reason === 'EMAIL_TAKEN') {
        throw UserErrors.emailTaken(input.email, { flow, stage: 'commit' });
      }
      throw UserErrors.idCollision({ flow, userId: user.id });
    }

    this.deps.logger.info('users.create.success', {
      flow,
      requestId: ctx.requestId,
      userId: result.user.id,
    });

    return result.user;
  }

  async updateUser(id: UserId, input: UserInput, ctx: UserCallContext = {}): Promise<User> {
    const flow = 'users.update';
    const opts = this.repoOpts(ctx);

    if (await this.deps.userRepo.emailExists(input.email, id, opts)) {
      throw UserErrors.emailTakenByOther(input.email, { flow, userId: id });
    }

    const result = await this.deps.userRepo.update(
      id,
      (current) => ({
        ...current,
        email: input.email,
        fullName: input.fullName,
        updatedAt: this.deps.clock(),
      }),
      opts,
    );

    if (!result.ok) {
      if (result.reason === 'NOT_FOUND') throw UserErrors.userNotFound(id, { flow });
      throw UserErrors.emailTakenByOther(input.email, { flow, userId: id, stage: 'commit' });
    }

    this.deps.logger.info('users.update.success', {
      flow,
      requestId: ctx.requestId,
      userId: id,
    });

    return result.user;
  }

  async deleteUser(id: UserId, ctx: UserCallContext = {}): Promise<void> {
    const flow = 'users.delete';

    const deleted = await this.deps.userRepo.delete(id, this.repoOpts(ctx));
    if (!deleted) throw UserErrors.userNotFound(id, { flow });

    this.deps.logger.info('users.delete.success', {
      flow,
      requestId: ctx.requestId,
      userId: id,
    });
  }
}
