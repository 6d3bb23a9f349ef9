import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InvalidOrExpiredTokenError } from '@accounts/auth-core';
import { createDatabase, type DatabaseConnection } from '@accounts/database';
import { UserRepository } from '../../users/user-repository.js';
import type { User } from '../../users/user-types.js';
import { VerificationRepository } from '../verification-repository.js';
import { VerificationService } from '../verification-service.js';

const BASE_TIME = new Date('2025-01-01T00:00:00.000Z');
const MINUTE_MS = 60 * 1000;

describe('VerificationService', () => {
  let connection: DatabaseConnection;
  let users: UserRepository;
  let service: VerificationService;
  let clock: Date;
  let alice: User;
  let bob: User;

  function advance(ms: number): void {
    clock = new Date(clock.getTime() + ms);
  }

  beforeEach(async () => {
    connection = createDatabase(':memory:');
    clock = BASE_TIME;
    users = new UserRepository(connection.db, () => clock);
    const base = { passwordHash: 'scrypt$2$c2FsdA==$a2V5', role: 'user' as const, profile: {} };
    alice = await users.create({ email: 'alice@example.com', username: 'alice', ...base });
    bob = await users.create({ email: 'bob@example.com', username: 'bob', ...base });
    service = new VerificationService({
      store: new VerificationRepository(connection.db),
      ttls: { passwordResetTtlMinutes: 60, emailVerificationTtlHours: 24 },
      now: () => clock,
    });
  });

  afterEach(() => {
    connection.close();
  });

  describe('password reset', () => {
    it('should issue a prefixed token with its expiry', async () => {
      const issued = await service.issueResetToken(alice);

      expect(issued.token.startsWith('pr_')).toBe(true);
      expect(issued.expiresAt).toEqual(new Date(BASE_TIME.getTime() + 60 * MINUTE_MS));
    });

    it('should apply the new hash and accept the token only once', async () => {
      const { token } = await service.issueResetToken(alice);

      const updated = await service.redeemResetToken(token, alice.id, 'scrypt$2$bmV3$aGFzaA==');

      expect(updated.passwordHash).toBe('scrypt$2$bmV3$aGFzaA==');
      await expect(service.redeemResetToken(token, alice.id, 'scrypt$2$YWdhaW4=$aGFzaA==')).rejects.toBeInstanceOf(
        InvalidOrExpiredTokenError
      );
      expect((await users.findById(alice.id))?.passwordHash).toBe('scrypt$2$bmV3$aGFzaA==');
    });

    it('should invalidate the previous token when a new one is issued', async () => {
      const first = await service.issueResetToken(alice);
      const second = await service.issueResetToken(alice);

      await expect(service.inspectResetToken(first.token)).rejects.toBeInstanceOf(InvalidOrExpiredTokenError);
      expect(await service.inspectResetToken(second.token)).toBe(alice.id);
    });

    it('should expire after the reset lifetime', async () => {
      const { token } = await service.issueResetToken(alice);

      advance(59 * MINUTE_MS);
      expect(await service.inspectResetToken(token, alice.id)).toBe(alice.id);

      advance(MINUTE_MS);
      await expect(service.inspectResetToken(token, alice.id)).rejects.toBeInstanceOf(InvalidOrExpiredTokenError);
    });

    it('should reject a token presented for another user', async () => {
      const { token } = await service.issueResetToken(alice);

      await expect(service.redeemResetToken(token, bob.id, 'scrypt$2$eA==$eA==')).rejects.toBeInstanceOf(
        InvalidOrExpiredTokenError
      );
    });

    it('should reject a token whose secret was altered', async () => {
      const { token } = await service.issueResetToken(alice);
      const [id] = token.split('.');

      await expect(service.inspectResetToken(`${id}.${'A'.repeat(43)}`)).rejects.toBeInstanceOf(
        InvalidOrExpiredTokenError
      );
    });

    it.each(['', 'pr_not-a-token', 'garbage', 'pr_00000000-0000-4000-8000-000000000000.secret'])(
      'should reject malformed or unknown token %j',
      async (token) => {
        await expect(service.inspectResetToken(token)).rejects.toBeInstanceOf(InvalidOrExpiredTokenError);
      }
    );

    it('should reject a verification token', async () => {
      const { token } = await service.issueVerificationToken(alice);

      await expect(service.inspectResetToken(token)).rejects.toBeInstanceOf(InvalidOrExpiredTokenError);
    });

    it('should reject tokens of deleted accounts', async () => {
      const { token } = await service.issueResetToken(alice);
      await users.softDelete(alice.id);

      await expect(service.redeemResetToken(token, alice.id, 'scrypt$2$eA==$eA==')).rejects.toBeInstanceOf(
        InvalidOrExpiredTokenError
      );
    });

    it('should let exactly one concurrent redemption succeed', async () => {
      const { token } = await service.issueResetToken(alice);

      const results = await Promise.allSettled(
        Array.from({ length: 5 }, (_, index) => service.redeemResetToken(token, alice.id, `scrypt$2$eA==$${index}`))
      );

      const fulfilled = results.filter((result) => result.status === 'fulfilled');
      expect(fulfilled).toHaveLength(1);
      expect(results.filter((result) => result.status === 'rejected')).toHaveLength(4);
    });
  });

  describe('email verification', () => {
    it('should mark the account verified', async () => {
      const { token, expiresAt } = await service.issueVerificationToken(alice);

      expect(token.startsWith('ev_')).toBe(true);
      expect(expiresAt).toEqual(new Date(BASE_TIME.getTime() + 24 * 60 * MINUTE_MS));

      const verified = await service.redeemVerificationToken(token);

      expect(verified.isEmailVerified).toBe(true);
      await expect(service.redeemVerificationToken(token)).rejects.toBeInstanceOf(InvalidOrExpiredTokenError);
    });

    it('should reject a reset token', async () => {
      const { token } = await service.issueResetToken(alice);

      await expect(service.redeemVerificationToken(token)).rejects.toBeInstanceOf(InvalidOrExpiredTokenError);
    });

    it('should keep outstanding reset tokens when a verification token is issued', async () => {
      const reset = await service.issueResetToken(alice);
      await service.issueVerificationToken(alice);

      expect(await service.inspectResetToken(reset.token)).toBe(alice.id);
    });
  });

  describe('purgeExpired', () => {
    it('should delete consumed and expired tokens', async () => {
      const reset = await service.issueResetToken(alice);
      await service.redeemResetToken(reset.token, alice.id, 'scrypt$2$eA==$eA==');
      const verification = await service.issueVerificationToken(bob);

      expect(await service.purgeExpired()).toBe(1);
      expect(await service.redeemVerificationToken(verification.token)).toMatchObject({ id: bob.id });

      await service.issueVerificationToken(bob);
      advance(24 * 60 * MINUTE_MS);
      expect(await service.purgeExpired()).toBe(2);
    });
  });
});
