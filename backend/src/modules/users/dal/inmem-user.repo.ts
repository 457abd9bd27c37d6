/**
 * backend/src/modules/users/dal/inmem-user.repo.ts
 *
 * WHY:
 * - Process-lifetime user store (no persistence).
 * - Safe for any number of concurrent requests without caller-side locking.
 *
 * HOW IT WORKS:
 * - `users` maps id -> frozen record. The stored object's identity is its version:
 *   a writer commits only if the slot still holds the exact object it read.
 * - `emailIndex` maps normalized email -> id. Create/update check it inside the
 *   same synchronous block that commits, so two writers can never both claim an email.
 * - Each commit is a single synchronous block; other callers only interleave at
 *   `await` points (the updater may be async).
 */

import type {
  CreateUserResult,
  RepoCallOptions,
  UpdateUserResult,
  UserRepo,
  UserUpdater,
} from './user.repo';
import type { User, UserId } from '../user.types';

type StoredUser = Readonly<User>;

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

// Ordinal, case folded to upper: '_' (0x5F) sorts after letters.
function compareIgnoreCase(a: string, b: string): number {
  const left = a.toUpperCase();
  const right = b.toUpperCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function compareUsers(a: User, b: User): number {
  return compareIgnoreCase(a.fullName, b.fullName) || compareIgnoreCase(a.email, b.email);
}

function copyUser(user: User): User {
  return {
    id: user.id,
    email: user.email,
    fullName: user.fullName,
    createdAt: new Date(user.createdAt.getTime()),
    updatedAt: user.updatedAt ? new Date(user.updatedAt.getTime()) : null,
  };
}

function freezeUser(user: User): StoredUser {
  return Object.freeze(copyUser(user));
}

export class InMemUserRepo implements UserRepo {
  private readonly users = new Map<UserId, StoredUser>();
  private readonly emailIndex = new Map<string, UserId>();

  private run<T>(opts: RepoCallOptions | undefined, op: () => T): Promise<T> {
    try {
      opts?.signal?.throwIfAborted();
      return Promise.resolve(op());
    } catch (err) {
      return Promise.reject(err);
    }
  }

  private emailOwner(email: string): UserId | undefined {
    return this.emailIndex.get(normalizeEmail(email));
  }

  list(opts?: RepoCallOptions): Promise<User[]> {
    return this.run(opts, () => Array.from(this.users.values(), copyUser).sort(compareUsers));
  }

  get(id: UserId, opts?: RepoCallOptions): Promise<User | undefined> {
    return this.run(opts, () => {
      const user = this.users.get(id);
      return user ? copyUser(user) : undefined;
    });
  }

  create(user: User, opts?: RepoCallOptions): Promise<CreateUserResult> {
    return this.run(opts, (): CreateUserResult => {
      if (this.users.has(user.id)) return { ok: false, reason: 'ID_TAKEN' };
      if (this.emailOwner(user.email) !== undefined) return { ok: false, reason: 'EMAIL_TAKEN' };

      const stored = freezeUser(user);
      this.users.set(stored.id, stored);
      this.emailIndex.set(normalizeEmail(stored.email), stored.id);

      return { ok: true, user: copyUser(stored) };
    });
  }

  async update(id: UserId, updater: UserUpdater, opts?: RepoCallOptions): Promise<UpdateUserResult> {
    for (;;) {
      opts?.signal?.throwIfAborted();

      const current = this.users.get(id);
      if (!current) return { ok: false, reason: 'NOT_FOUND' };

      const candidate = await updater(copyUser(current));

      opts?.signal?.throwIfAborted();

      // Lost the race (replaced or deleted while the updater ran): re-read.
      if (this.users.get(id) !== current) continue;

      const next = freezeUser({ ...candidate, id: current.id, createdAt: current.createdAt });

      const owner = this.emailOwner(next.email);
      if (owner !== undefined && owner !== id) return { ok: false, reason: 'EMAIL_TAKEN' };

      this.users.set(id, next);

      const previousKey = normalizeEmail(current.email);
      const nextKey = normalizeEmail(next.email);
      if (previousKey !== nextKey) {
        this.emailIndex.delete(previousKey);
        this.emailIndex.set(nextKey, id);
      }

      return { ok: true, user: copyUser(next) };
    }
  }

  delete(id: UserId, opts?: RepoCallOptions): Promise<boolean> {
    return this.run(opts, () => {
      const current = this.users.get(id);
      if (!current) return false;

      this.users.delete(id);

      const key = normalizeEmail(current.email);
      if (this.emailIndex.get(key) === id) this.emailIndex.delete(key);

      return true;
    });
  }

  emailExists(email: string, excludeId?: UserId | null, opts?: RepoCallOptions): Promise<boolean> {
    return this.run(opts, () => {
      if (!email.trim()) return false;

      const owner = this.emailOwner(email);
      return owner !== undefined && owner !== excludeId;
    });
  }
}
