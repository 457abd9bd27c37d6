/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal or /helpers.
 *
 * RULES:
 * - Only export stable contracts needed outside the module.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { InMemUserRepo } from './dal/inmem-user.repo';
export type { UserRepo } from './dal/user.repo';
export type { User, UserId, UserResponse } from './user.types';
