/**
 * User Repository Integration Tests
 *
 * Runs against an in-memory SQLite database with the real migrations
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { hashPassword } from '@accounts/auth';
import { DuplicateResourceError, NotFoundError } from '@accounts/auth-core';
import { createDatabase, type DatabaseConnection } from '@accounts/database';
import { UserRepository } from '../user-repository.js';
import type { CreateUserData } from '../user-types.js';

function userData(overrides: Partial<CreateUserData> = {}): CreateUserData {
  return {
    email: 'alice@example.com',
    username: 'alice',
    passwordHash: 'scrypt$16384$c2FsdA==$a2V5',
    role: 'user',
    profile: {},
    ...overrides,
  };
}

describe('UserRepository', () => {
  let connection: DatabaseConnection;
  let clock: Date;
  let userRepo: UserRepository;

  beforeEach(() => {
    connection = createDatabase(':memory:');
    clock = new Date('2025-01-01T00:00:00.000Z');
    userRepo = new UserRepository(connection.db, () => clock);
  });

  afterEach(() => {
    connection.close();
  });

  describe('create', () => {
    it('should apply registration defaults and normalize the email', async () => {
      const user = await userRepo.create(
        userData({ email: '  Alice@Example.COM ', profile: { country: 'France' } })
      );

      expect(user).toMatchObject({
        email: 'alice@example.com',
        username: 'alice',
        role: 'user',
        country: 'France',
        phoneNumber: null,
        isActive: true,
        isBlocked: false,
        isEmailVerified: false,
        lastLoginAt: null,
        deletedAt: null,
      });
      expect(user.createdAt).toEqual(clock);
    });

    it('should reject a duplicate email', async () => {
      await userRepo.create(userData());

      const error = await userRepo.create(userData({ username: 'alice2' })).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DuplicateResourceError);
      expect(error).toMatchObject({ field: 'email', message: 'A user with that email already exists' });
    });

    it('should reject a duplicate username', async () => {
      await userRepo.create(userData());

      await expect(userRepo.create(userData({ email: 'other@example.com' }))).rejects.toMatchObject({
        field: 'username',
      });
    });

    it('should let exactly one of many concurrent registrations succeed', async () => {
      const attempts = Array.from({ length: 10 }, (_, index) =>
        userRepo.create(userData({ username: `alice${index}` }))
      );

      const results = await Promise.allSettled(attempts);

      expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
      expect(await userRepo.count()).toBe(1);
    });
  });

  describe('findByEmail', () => {
    it('should return null if user does not exist', async () => {
      expect(await userRepo.findByEmail('nobody@example.com')).toBeNull();
    });

    it('should match case-insensitively', async () => {
      const created = await userRepo.create(userData());

      const found = await userRepo.findByEmail('ALICE@example.com');

      expect(found?.id).toBe(created.id);
    });
  });

  describe('findByUsername', () => {
    it('should return the live user with that username', async () => {
      const created = await userRepo.create(userData());

      expect((await userRepo.findByUsername('alice'))?.id).toBe(created.id);
      expect(await userRepo.findByUsername('bob')).toBeNull();
    });

    it('should not return a soft-deleted user', async () => {
      const created = await userRepo.create(userData());
      await userRepo.softDelete(created.id);

      expect(await userRepo.findByUsername('alice')).toBeNull();
    });
  });

  describe('update', () => {
    it('should update fields and bump updatedAt', async () => {
      const created = await userRepo.create(userData());
      clock = new Date('2025-01-02T00:00:00.000Z');

      const updated = await userRepo.update(created.id, { bio: 'Hello', phoneNumber: null });

      expect(updated.bio).toBe('Hello');
      expect(updated.updatedAt).toEqual(new Date('2025-01-02T00:00:00.000Z'));
      expect(updated.createdAt).toEqual(new Date('2025-01-01T00:00:00.000Z'));
    });

    it('should translate a username clash', async () => {
      await userRepo.create(userData());
      const bob = await userRepo.create(userData({ email: 'bob@example.com', username: 'bob' }));

      await expect(userRepo.update(bob.id, { username: 'alice' })).rejects.toBeInstanceOf(
        DuplicateResourceError
      );
    });

    it('should throw NotFoundError for unknown users', async () => {
      await expect(
        userRepo.update('00000000-0000-4000-8000-000000000000', { bio: 'x' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('updateStatus', () => {
    it('should return both snapshots', async () => {
      const created = await userRepo.create(userData());

      const { before, after } = await userRepo.updateStatus(created.id, {
        role: 'moderator',
        isBlocked: true,
      });

      expect(before).toMatchObject({ role: 'user', isBlocked: false });
      expect(after).toMatchObject({ role: 'moderator', isBlocked: true, isActive: true });
    });

    it('should throw NotFoundError for deleted users', async () => {
      const created = await userRepo.create(userData());
      await userRepo.softDelete(created.id);

      await expect(userRepo.updateStatus(created.id, { isActive: false })).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('softDelete', () => {
    it('should hide the user and release the email and username', async () => {
      const created = await userRepo.create(userData());

      await userRepo.softDelete(created.id);

      expect(await userRepo.findById(created.id)).toBeNull();
      expect(await userRepo.findByEmail('alice@example.com')).toBeNull();
      const again = await userRepo.create(userData());
      expect(again.id).not.toBe(created.id);
    });
  });

  describe('list and count', () => {
    it('should page through live users oldest first', async () => {
      const first = await userRepo.create(userData());
      clock = new Date('2025-01-02T00:00:00.000Z');
      const second = await userRepo.create(userData({ email: 'bob@example.com', username: 'bob' }));
      clock = new Date('2025-01-03T00:00:00.000Z');
      const third = await userRepo.create(userData({ email: 'carol@example.com', username: 'carol' }));
      await userRepo.softDelete(second.id);

      const page = await userRepo.list({ limit: 10, offset: 0 });

      expect(page.map((user) => user.id)).toEqual([first.id, third.id]);
      expect(await userRepo.list({ limit: 1, offset: 1 })).toHaveLength(1);
      expect(await userRepo.count()).toBe(2);
    });
  });

  describe('recordLogin', () => {
    it('should store the login time', async () => {
      const created = await userRepo.create(userData());
      const at = new Date('2025-01-05T10:00:00.000Z');

      await userRepo.recordLogin(created.id, at);

      expect((await userRepo.findById(created.id))?.lastLoginAt).toEqual(at);
    });
  });

  describe('verifySecret', () => {
    it('should check the plaintext against the stored hash', async () => {
      const created = await userRepo.create(
        userData({ passwordHash: await hashPassword('correct-horse-42', 1024) })
      );

      expect(await userRepo.verifySecret(created, 'correct-horse-42')).toBe(true);
      expect(await userRepo.verifySecret(created, 'wrong-horse-42')).toBe(false);
    });
  });
});
