/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Storage contract for users. Services depend on this, never on a concrete store,
 *   so a persistent backend can replace the in-memory one without touching them.
 *
 * RULES:
 * - No AppError: outcomes the caller must map (not found, id/email taken) are
 *   return values. Only contract violations and aborted signals reject.
 * - Callers always receive copies; mutating a returned User never touches the store.
 * - Every operation accepts an AbortSignal and rejects with its reason when aborted.
 */

import type { User, UserId } from '../user.types';

export type RepoCallOptions = {
  signal?: AbortSignal;
};

/**
 * Produces the replacement record from the current one.
 * May be async; the store re-runs it if another writer commits in the meantime.
 */
export type UserUpdater = (current: User) => User | Promise<User>;

export type CreateUserResult =
  | { ok: true; user: User }
  | { ok: false; reason: 'ID_TAKEN' | 'EMAIL_TAKEN' };

export type UpdateUserResult =
  | { ok: true; user: User }
  | { ok: false; reason: 'NOT_FOUND' | 'EMAIL_TAKEN' };

export interface UserRepo {
  /** Snapshot sorted by fullName, then email (both case-insensitive). */
  list(opts?: RepoCallOptions): Promise<User[]>;

  get(id: UserId, opts?: RepoCallOptions): Promise<User | undefined>;

  create(user: User, opts?: RepoCallOptions): Promise<CreateUserResult>;

  /**
   * Optimistic read-transform-commit. Retries on a lost race; stops with
   * NOT_FOUND once the record is gone. `id` and `createdAt` are never changed.
   */
  update(id: UserId, updater: UserUpdater, opts?: RepoCallOptions): Promise<UpdateUserResult>;

  delete(id: UserId, opts?: RepoCallOptions): Promise<boolean>;

  /**
   * Advisory uniqueness check (create/update re-check at commit time).
   * Blank email -> false.
   */
  emailExists(email: string, excludeId?: UserId | null, opts?: RepoCallOptions): Promise<boolean>;
}
