/**
 * Verification Domain Types
 *
 * Single-use action tokens for password reset and email verification
 */

import type { TokenHashEnvelope } from '@accounts/auth';
import type { ActionTokenPurpose, ActionTokenRecord } from '@accounts/database';
import type { UpdateUserData, User } from '../users/user-types.js';

export type { ActionTokenPurpose };

export type ActionToken = ActionTokenRecord;

export interface CreateActionTokenData {
  id: string;
  userId: string;
  purpose: ActionTokenPurpose;
  hashEnvelope: TokenHashEnvelope;
  createdAt: Date;
}

export interface ConsumeActionTokenParams {
  id: string;
  purpose: ActionTokenPurpose;
  userId: string;
  /** Tokens created at or before this instant have expired */
  issuedAfter: Date;
  consumedAt: Date;
  /** Applied to the owning user in the same transaction */
  userUpdate: UpdateUserData;
}

export interface ActionTokenTtls {
  passwordResetTtlMinutes: number;
  emailVerificationTtlHours: number;
}

export interface IssuedActionToken {
  /** Full token value to deliver (`<prefix>_<tokenId>.<secret>`) */
  token: string;
  expiresAt: Date;
}

export interface ActionTokenStore {
  /** Consume outstanding tokens of the same purpose, then store the new one */
  replaceOutstanding(data: CreateActionTokenData): Promise<void>;
  findById(id: string): Promise<ActionToken | null>;
  /**
   * Mark the token consumed only if it is still unconsumed and unexpired, then
   * apply `userUpdate`. Returns null, writing nothing, when either step finds no row.
   */
  consumeAndApply(params: ConsumeActionTokenParams): Promise<User | null>;
  purge(now: Date, ttls: ActionTokenTtls): Promise<number>;
}
