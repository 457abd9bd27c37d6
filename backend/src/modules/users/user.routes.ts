/**
 * backend/src/modules/users/user.routes.ts
 *
 * WHY:
 * - Declares Users module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Route schemas carry OpenAPI docs only; bodies are validated by Zod in the controller.
 */

import type { FastifyInstance } from 'fastify';
import type { UserController, UserIdRoute } from './user.controller';

const tags = ['Users'];
const security = [{ bearerAuth: [] }];

export function registerUserRoutes(app: FastifyInstance, controller: UserController) {
  app.get(
    '/api/users',
    {
      schema: {
        tags,
        security,
        operationId: 'GetUsers',
        summary: 'Get all users',
        description: 'Returns all registered users ordered by full name, then email.',
      },
    },
    controller.listUsers.bind(controller),
  );

  app.get<UserIdRoute>(
    '/api/users/:id',
    {
      schema: {
        tags,
        security,
        operationId: 'GetUserById',
        summary: 'Get a user by id',
        description: 'Returns a single user when the identifier exists.',
      },
    },
    controller.getUser.bind(controller),
  );

  app.post(
    '/api/users',
    {
      schema: {
        tags,
        security,
        operationId: 'CreateUser',
        summary: 'Create a new user',
        description: 'Registers a new user when the request is valid and the email is unused.',
      },
    },
    controller.createUser.bind(controller),
  );

  app.put<UserIdRoute>(
    '/api/users/:id',
    {
      schema: {
        tags,
        security,
        operationId: 'UpdateUser',
        summary: 'Update an existing user',
        description: 'Updates a user when the identifier exists and the payload is valid.',
      },
    },
    controller.updateUser.bind(controller),
  );

  app.delete<UserIdRoute>(
    '/api/users/:id',
    {
      schema: {
        tags,
        security,
        operationId: 'DeleteUser',
        summary: 'Delete a user',
        description: 'Deletes the specified user when it exists.',
      },
    },
    controller.deleteUser.bind(controller),
  );
}
