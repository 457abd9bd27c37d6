/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for /api/users.
 * - Validates request payloads/params and shapes responses.
 *
 * RULES:
 * - No storage access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { createUserSchema, toFieldErrors, updateUserSchema, userIdParamsSchema } from './user.schemas';
import { UserErrors } from './user.errors';
import { toUserResponse } from './helpers/to-user-response';
import type { UserCallContext, UserService } from './user.service';
import type { UserId } from './user.types';

export type UserIdRoute = {
  Params: { id: string };
};

function callContext(req: Pick<FastifyRequest, 'requestContext'>): UserCallContext {
  return {
    requestId: req.requestContext.requestId,
    signal: req.requestContext.signal,
  };
}

/** Non-UUID ids can never match a record: answer 404 like any unknown id. */
function parseUserId(req: FastifyRequest<UserIdRoute>): UserId {
  const parsed = userIdParamsSchema.safeParse(req.params);
  if (!parsed.success) throw UserErrors.userNotFound(req.params.id);
  return parsed.data.id;
}

export class UserController {
  constructor(private readonly userService: UserService) {}

  async listUsers(req: FastifyRequest, reply: FastifyReply) {
    const users = await this.userService.listUsers(callContext(req));
    return reply.status(200).send(users.map(toUserResponse));
  }

  async getUser(req: FastifyRequest<UserIdRoute>, reply: FastifyReply) {
    const id = parseUserId(req);
    const user = await this.userService.getUser(id, callContext(req));
    return reply.status(200).send(toUserResponse(user));
  }

  async createUser(req: FastifyRequest, reply: FastifyReply) {
    const parsed = createUserSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Validation failed.', toFieldErrors(parsed.error));
    }

    const user = await this.userService.createUser(parsed.data, callContext(req));

    return reply.status(201).header('location', `/api/users/${user.id}`).send(toUserResponse(user));
  }

  async updateUser(req: FastifyRequest<UserIdRoute>, reply: FastifyReply) {
    const id = parseUserId(req);
    const parsed = updateUserSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Validation failed.', toFieldErrors(parsed.error));
    }

    const user = await this.userService.updateUser(id, parsed.data, callContext(req));

    return reply.status(200).send(toUserResponse(user));
  }

  async deleteUser(req: FastifyRequest<UserIdRoute>, reply: FastifyReply) {
    const id = parseUserId(req);
    await this.userService.deleteUser(id, callContext(req));
    return reply.status(204).send();
  }
}
