import type { User, UserResponse } from '../user.types';

/** Domain -> wire shape. Dates become ISO-8601 UTC; `updatedAt` is omitted until set. */
export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    fullName: user.fullName,
    createdAt: user.createdAt.toISOString(),
    ...(user.updatedAt ? { updatedAt: user.updatedAt.toISOString() } : {}),
  };
}
