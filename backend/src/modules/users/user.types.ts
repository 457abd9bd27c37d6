/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - One email = one user (case-insensitive).
 *
 * RULES:
 * - `id` and `createdAt` never change after creation.
 * - `updatedAt` is null until the first successful update.
 */

export type UserId = string;

export type User = {
  id: UserId;
  email: string;
  fullName: string;

  createdAt: Date;
  updatedAt: Date | null;
};

/** Wire representation (GET/POST/PUT responses). `updatedAt` is omitted until set. */
export type UserResponse = {
  id: UserId;
  email: string;
  fullName: string;
  createdAt: string;
  updatedAt?: string;
};
