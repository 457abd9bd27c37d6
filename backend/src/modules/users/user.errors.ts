/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Messages echo the offending id/email so clients can tell which one clashed.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  userNotFound(id: string, meta?: AppErrorMeta) {
    return AppError.notFound(`User with id '${id}' was not found.`, { userId: id, ...meta });
  },

  emailTaken(email: string, meta?: AppErrorMeta) {
    return AppError.conflict(`A user with email '${email}' already exists.`, meta);
  },

  emailTakenByOther(email: string, meta?: AppErrorMeta) {
    return AppError.conflict(`A different user already uses email '${email}'.`, meta);
  },

  idCollision(meta?: AppErrorMeta) {
    return AppError.internal('Generated user id already exists', meta);
  },
} as const;
