/**
 * Verification Service
 *
 * Issues and redeems single-use action tokens (password reset, email
 * verification). Every rejection is the same InvalidOrExpiredTokenError.
 */

import {
  EMAIL_VERIFICATION_TOKEN_PREFIX,
  PASSWORD_RESET_TOKEN_PREFIX,
  createOpaqueToken,
  createTokenHashEnvelope,
  parseOpaqueToken,
  verifyTokenSecret,
} from '@accounts/auth';
import { InvalidOrExpiredTokenError } from '@accounts/auth-core';
import type { User } from '../users/user-types.js';
import type {
  ActionToken,
  ActionTokenPurpose,
  ActionTokenStore,
  ActionTokenTtls,
  IssuedActionToken,
} from './verification-types.js';

const PREFIX_BY_PURPOSE = {
  password_reset: PASSWORD_RESET_TOKEN_PREFIX,
  email_verification: EMAIL_VERIFICATION_TOKEN_PREFIX,
} as const satisfies Record<ActionTokenPurpose, string>;

type VerificationServiceDependencies = {
  store: ActionTokenStore;
  ttls: ActionTokenTtls;
  now?: () => Date;
};

export class VerificationService {
  private readonly store: ActionTokenStore;
  private readonly ttls: ActionTokenTtls;
  private readonly now: () => Date;

  constructor(dependencies: VerificationServiceDependencies) {
    this.store = dependencies.store;
    this.ttls = dependencies.ttls;
    this.now = dependencies.now ?? (() => new Date());
  }

  get resetTtlMinutes(): number {
    return this.ttls.passwordResetTtlMinutes;
  }

  get verificationTtlHours(): number {
    return this.ttls.emailVerificationTtlHours;
  }

  issueResetToken(user: Pick<User, 'id'>): Promise<IssuedActionToken> {
    return this.issue(user.id, 'password_reset');
  }

  issueVerificationToken(user: Pick<User, 'id'>): Promise<IssuedActionToken> {
    return this.issue(user.id, 'email_verification');
  }

  /**
   * Generate and hash a token without storing it, so that requests for
   * unknown accounts cost the same as real ones.
   */
  issueDecoyToken(purpose: ActionTokenPurpose): void {
    const opaque = createOpaqueToken({ prefix: PREFIX_BY_PURPOSE[purpose] });
    createTokenHashEnvelope(opaque.tokenSecret);
  }

  /**
   * Validate a reset token without consuming it; returns the owner's id
   */
  async inspectResetToken(token: string, userId?: string): Promise<string> {
    const record = await this.resolve(token, 'password_reset', userId);
    return record.userId;
  }

  redeemResetToken(token: string, userId: string | undefined, newPasswordHash: string): Promise<User> {
    return this.redeem(token, 'password_reset', userId, { passwordHash: newPasswordHash });
  }

  redeemVerificationToken(token: string): Promise<User> {
    return this.redeem(token, 'email_verification', undefined, { isEmailVerified: true });
  }

  async purgeExpired(): Promise<number> {
    return this.store.purge(this.now(), this.ttls);
  }

  private async issue(userId: string, purpose: ActionTokenPurpose): Promise<IssuedActionToken> {
    const createdAt = this.now();
    const opaque = createOpaqueToken({ prefix: PREFIX_BY_PURPOSE[purpose] });

    await this.store.replaceOutstanding({
      id: opaque.tokenId,
      userId,
      purpose,
      hashEnvelope: createTokenHashEnvelope(opaque.tokenSecret),
      createdAt,
    });

    return {
      token: opaque.value,
      expiresAt: new Date(createdAt.getTime() + this.ttlMs(purpose)),
    };
  }

  private async redeem(
    token: string,
    purpose: ActionTokenPurpose,
    userId: string | undefined,
    userUpdate: { passwordHash?: string; isEmailVerified?: boolean }
  ): Promise<User> {
    const record = await this.resolve(token, purpose, userId);
    const now = this.now();

    // Conditional consume: a concurrent redemption that got here first leaves nothing to update
    const user = await this.store.consumeAndApply({
      id: record.id,
      purpose,
      userId: record.userId,
      issuedAfter: new Date(now.getTime() - this.ttlMs(purpose)),
      consumedAt: now,
      userUpdate,
    });

    if (!user) {
      throw new InvalidOrExpiredTokenError();
    }
    return user;
  }

  private async resolve(
    token: string,
    purpose: ActionTokenPurpose,
    userId: string | undefined
  ): Promise<ActionToken> {
    const parsed = parseOpaqueToken(token, { expectedPrefix: PREFIX_BY_PURPOSE[purpose] });
    if (!parsed) {
      throw new InvalidOrExpiredTokenError();
    }

    const record = await this.store.findById(parsed.tokenId);
    if (
      !record ||
      record.purpose !== purpose ||
      (userId !== undefined && record.userId !== userId) ||
      record.consumedAt !== null ||
      this.isExpired(record) ||
      !verifyTokenSecret(parsed.tokenSecret, record.hashEnvelope)
    ) {
      throw new InvalidOrExpiredTokenError();
    }

    return record;
  }

  private isExpired(record: ActionToken): boolean {
    return record.createdAt.getTime() + this.ttlMs(record.purpose) <= this.now().getTime();
  }

  private ttlMs(purpose: ActionTokenPurpose): number {
    return purpose === 'password_reset'
      ? this.ttls.passwordResetTtlMinutes * 60 * 1000
      : this.ttls.emailVerificationTtlHours * 60 * 60 * 1000;
  }
}
