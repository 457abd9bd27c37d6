import { describe, it, expect, vi } from 'vitest';
import { randomUUID } from 'node:crypto';

import { InMemUserRepo } from '../../../src/modules/users/dal/inmem-user.repo';
import type { User } from '../../../src/modules/users/user.types';

const CREATED_AT = new Date('2026-01-01T00:00:00.000Z');

function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: randomUUID(),
    email: `user-${randomUUID().slice(0, 8)}@example.com`,
    fullName: 'Test User',
    createdAt: CREATED_AT,
    updatedAt: null,
    ...overrides,
  };
}

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function errorName(err: unknown): string {
  return err instanceof Error ? err.name : String(err);
}

async function seed(repo: InMemUserRepo, user: User): Promise<User> {
  const result = await repo.create(user);
  if (!result.ok) throw new Error(`seed failed: ${result.reason}`);
  return result.user;
}

describe('InMemUserRepo', () => {
  describe('create / get', () => {
    it('stores the user and returns it by id', async () => {
      const repo = new InMemUserRepo();
      const user = makeUser({ email: 'jane.doe@example.com', fullName: 'Jane Doe' });

      const result = await repo.create(user);
      expect(result).toEqual({ ok: true, user });

      expect(await repo.get(user.id)).toEqual(user);
    });

    it('returns undefined for an unknown id', async () => {
      const repo = new InMemUserRepo();
      expect(await repo.get(randomUUID())).toBeUndefined();
    });

    it('rejects a duplicate id without touching the existing record', async () => {
      const repo = new InMemUserRepo();
      const original = await seed(repo, makeUser({ fullName: 'First Owner' }));

      const result = await repo.create(makeUser({ id: original.id, fullName: 'Second Owner' }));

      expect(result).toEqual({ ok: false, reason: 'ID_TAKEN' });
      expect((await repo.get(original.id))?.fullName).toBe('First Owner');
    });

    it('rejects an email that differs only in case', async () => {
      const repo = new InMemUserRepo();
      await seed(repo, makeUser({ email: 'a@example.com' }));

      const second = makeUser({ email: 'A@EXAMPLE.COM' });
      const result = await repo.create(second);

      expect(result).toEqual({ ok: false, reason: 'EMAIL_TAKEN' });
      expect(await repo.get(second.id)).toBeUndefined();
    });

    it('lets only one of two concurrent creates claim the same email', async () => {
      const repo = new InMemUserRepo();

      const results = await Promise.all([
        repo.create(makeUser({ email: 'race@example.com' })),
        repo.create(makeUser({ email: 'Race@Example.com' })),
      ]);

      expect(results.filter((r) => r.ok)).toHaveLength(1);
      expect(results.filter((r) => !r.ok)).toEqual([{ ok: false, reason: 'EMAIL_TAKEN' }]);
      expect(await repo.list()).toHaveLength(1);
    });

    it('hands out copies: mutating a returned user does not change the store', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser({ fullName: 'Kept Name' }));

      const fetched = await repo.get(user.id);
      expect(fetched).toBeDefined();
      if (!fetched) return;

      fetched.fullName = 'Changed';
      fetched.createdAt.setTime(0);

      const again = await repo.get(user.id);
      expect(again?.fullName).toBe('Kept Name');
      expect(again?.createdAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
    });
  });

  describe('list', () => {
    it('sorts by full name then email, ignoring case', async () => {
      const repo = new InMemUserRepo();
      await seed(repo, makeUser({ fullName: 'Zoe Adams', email: 'zoe@example.com' }));
      await seed(repo, makeUser({ fullName: 'anna Brown', email: 'b@example.com' }));
      await seed(repo, makeUser({ fullName: 'Mark Twain', email: 'mark@example.com' }));
      await seed(repo, makeUser({ fullName: 'Anna Brown', email: 'A@example.com' }));

      const users = await repo.list();

      expect(users.map((u) => [u.fullName, u.email])).toEqual([
        ['Anna Brown', 'A@example.com'],
        ['anna Brown', 'b@example.com'],
        ['Mark Twain', 'mark@example.com'],
        ['Zoe Adams', 'zoe@example.com'],
      ]);
    });

    it('breaks full-name ties by email in ordinal upper-case order', async () => {
      const repo = new InMemUserRepo();
      await seed(repo, makeUser({ fullName: 'John Doe', email: 'john_doe@example.com' }));
      await seed(repo, makeUser({ fullName: 'John Doe', email: 'johna@example.com' }));
      await seed(repo, makeUser({ fullName: 'john doe', email: 'JOHN[x]@example.com' }));

      const users = await repo.list();

      // 'A' (0x41) < '[' (0x5B) < '_' (0x5F) once both sides are upper-cased
      expect(users.map((u) => u.email)).toEqual([
        'johna@example.com',
        'JOHN[x]@example.com',
        'john_doe@example.com',
      ]);
    });

    it('returns a snapshot unaffected by later writes', async () => {
      const repo = new InMemUserRepo();
      const first = await seed(repo, makeUser({ fullName: 'First User' }));

      const snapshot = await repo.list();

      await seed(repo, makeUser({ fullName: 'Second User' }));
      await repo.update(first.id, (current) => ({ ...current, fullName: 'Renamed User' }));

      expect(snapshot).toHaveLength(1);
      expect(snapshot[0].fullName).toBe('First User');
    });

    it('returns an empty list for an empty store', async () => {
      expect(await new InMemUserRepo().list()).toEqual([]);
    });
  });

  describe('update', () => {
    it('commits the transformed record', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser({ fullName: 'Before Name' }));
      const updatedAt = new Date('2026-02-01T00:00:00.000Z');

      const result = await repo.update(user.id, (current) => ({
        ...current,
        fullName: 'After Name',
        updatedAt,
      }));

      expect(result).toEqual({ ok: true, user: { ...user, fullName: 'After Name', updatedAt } });
      expect(await repo.get(user.id)).toEqual({ ...user, fullName: 'After Name', updatedAt });
    });

    it('reports NOT_FOUND for an unknown id and never calls the updater', async () => {
      const repo = new InMemUserRepo();
      const updater = vi.fn((current: User) => current);

      const result = await repo.update(randomUUID(), updater);

      expect(result).toEqual({ ok: false, reason: 'NOT_FOUND' });
      expect(updater).not.toHaveBeenCalled();
      expect(await repo.list()).toEqual([]);
    });

    it('keeps id and createdAt even when the updater tries to change them', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser());

      const result = await repo.update(user.id, (current) => ({
        ...current,
        id: randomUUID(),
        createdAt: new Date('1999-01-01T00:00:00.000Z'),
      }));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.user.id).toBe(user.id);
      expect(result.user.createdAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
      expect(await repo.list()).toHaveLength(1);
    });

    it('retries on a lost race and applies the transform to the latest record', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser({ fullName: 'Original Name' }));

      const gate = deferred();
      const seen: string[] = [];

      const slow = repo.update(user.id, async (current) => {
        seen.push(current.fullName);
        if (seen.length === 1) await gate.promise;
        return { ...current, fullName: `${current.fullName} + slow` };
      });

      const fast = await repo.update(user.id, (current) => ({ ...current, fullName: 'Fast Name' }));
      expect(fast.ok).toBe(true);

      gate.resolve();
      const result = await slow;

      expect(seen).toEqual(['Original Name', 'Fast Name']);
      expect(result.ok).toBe(true);
      expect((await repo.get(user.id))?.fullName).toBe('Fast Name + slow');
    });

    it('stops with NOT_FOUND when the record is deleted while the updater runs', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser());

      const gate = deferred();
      const updater = vi.fn(async (current: User) => {
        await gate.promise;
        return { ...current, fullName: 'Resurrected' };
      });

      const pending = repo.update(user.id, updater);

      expect(await repo.delete(user.id)).toBe(true);
      gate.resolve();

      expect(await pending).toEqual({ ok: false, reason: 'NOT_FOUND' });
      expect(updater).toHaveBeenCalledTimes(1);
      expect(await repo.get(user.id)).toBeUndefined();
    });

    it('serialises many concurrent async updates without losing any', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser({ fullName: 'Counter 0' }));

      const bump = async (current: User): Promise<User> => {
        await Promise.resolve();
        const n = Number(current.fullName.replace('Counter ', ''));
        return { ...current, fullName: `Counter ${n + 1}` };
      };

      const results = await Promise.all(Array.from({ length: 10 }, () => repo.update(user.id, bump)));

      expect(results.every((r) => r.ok)).toBe(true);
      expect((await repo.get(user.id))?.fullName).toBe('Counter 10');
    });

    it('rejects an email already owned by another user and leaves the record unchanged', async () => {
      const repo = new InMemUserRepo();
      await seed(repo, makeUser({ email: 'taken@example.com' }));
      const user = await seed(repo, makeUser({ email: 'mine@example.com' }));

      const result = await repo.update(user.id, (current) => ({
        ...current,
        email: 'TAKEN@example.com',
      }));

      expect(result).toEqual({ ok: false, reason: 'EMAIL_TAKEN' });
      expect((await repo.get(user.id))?.email).toBe('mine@example.com');
    });

    it('allows re-casing a user’s own email and releases a changed one', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser({ email: 'old@example.com' }));

      const recased = await repo.update(user.id, (current) => ({ ...current, email: 'OLD@example.com' }));
      expect(recased.ok).toBe(true);

      const moved = await repo.update(user.id, (current) => ({ ...current, email: 'new@example.com' }));
      expect(moved.ok).toBe(true);

      expect(await repo.emailExists('old@example.com')).toBe(false);
      expect(await repo.emailExists('new@example.com')).toBe(true);
    });
  });

  describe('delete', () => {
    it('removes once and reports false afterwards', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser());

      expect(await repo.delete(user.id)).toBe(true);
      expect(await repo.delete(user.id)).toBe(false);
      expect(await repo.get(user.id)).toBeUndefined();
    });

    it('frees the email for reuse', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser({ email: 'reuse@example.com' }));

      await repo.delete(user.id);

      const again = await repo.create(makeUser({ email: 'reuse@example.com' }));
      expect(again.ok).toBe(true);
    });
  });

  describe('emailExists', () => {
    it('matches case-insensitively and honours excludeId', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser({ email: 'Jane.Doe@example.com' }));

      expect(await repo.emailExists('jane.doe@EXAMPLE.com')).toBe(true);
      expect(await repo.emailExists('jane.doe@example.com', user.id)).toBe(false);
      expect(await repo.emailExists('jane.doe@example.com', randomUUID())).toBe(true);
      expect(await repo.emailExists('someone.else@example.com')).toBe(false);
    });

    it('answers false for blank input', async () => {
      const repo = new InMemUserRepo();
      await seed(repo, makeUser());

      expect(await repo.emailExists('')).toBe(false);
      expect(await repo.emailExists('   ')).toBe(false);
    });
  });

  describe('cancellation', () => {
    it('rejects every operation when the signal is already aborted', async () => {
      const repo = new InMemUserRepo();
      const user = makeUser();
      const signal = AbortSignal.abort();

      const outcomes = await Promise.all([
        repo.create(user, { signal }).catch(errorName),
        repo.list({ signal }).catch(errorName),
        repo.get(user.id, { signal }).catch(errorName),
        repo.update(user.id, (current) => current, { signal }).catch(errorName),
        repo.delete(user.id, { signal }).catch(errorName),
        repo.emailExists(user.email, null, { signal }).catch(errorName),
      ]);

      expect(outcomes).toEqual(Array.from({ length: 6 }, () => 'AbortError'));
      expect(await repo.list()).toEqual([]);
    });

    it('abandons an update aborted while its updater runs', async () => {
      const repo = new InMemUserRepo();
      const user = await seed(repo, makeUser({ fullName: 'Untouched Name' }));
      const controller = new AbortController();
      const gate = deferred();

      const pending = repo.update(
        user.id,
        async (current) => {
          await gate.promise;
          return { ...current, fullName: 'Should Not Land' };
        },
        { signal: controller.signal },
      );

      controller.abort(new Error('client went away'));
      gate.resolve();

      await expect(pending).rejects.toThrow('client went away');
      expect((await repo.get(user.id))?.fullName).toBe('Untouched Name');
    });
  });
});
