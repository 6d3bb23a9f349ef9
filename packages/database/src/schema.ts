/**
 * Drizzle ORM Schema: accounts tables
 *
 * Maps to the SQLite tables created by migration 001_initial.
 * Timestamps are stored as epoch milliseconds and read back as Date.
 */

import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';
import type { TokenHashEnvelope } from '@accounts/auth';
import { USER_ROLES } from '@accounts/types';

const timestamp = (name: string) => integer(name, { mode: 'timestamp_ms' });
const flag = (name: string) => integer(name, { mode: 'boolean' });

// =============================================================================
// users
// =============================================================================

export const users = sqliteTable(
  'users',
  {
    id: text('id').primaryKey(),
    email: text('email').notNull(),
    username: text('username').notNull(),
    passwordHash: text('password_hash').notNull(),
    recoveryEmail: text('recovery_email'),
    phoneNumber: text('phone_number'),
    address: text('address'),
    country: text('country'),
    bio: text('bio'),
    role: text('role', { enum: USER_ROLES }).notNull().default('user'),
    isActive: flag('is_active').notNull().default(true),
    isBlocked: flag('is_blocked').notNull().default(false),
    isEmailVerified: flag('is_email_verified').notNull().default(false),
    lastLoginAt: timestamp('last_login_at'),
    createdAt: timestamp('created_at').notNull(),
    updatedAt: timestamp('updated_at').notNull(),
    deletedAt: timestamp('deleted_at'),
  },
  (table) => ({
    createdIdx: index('idx_users_created_at').on(table.createdAt),
    // NOTE: email and username uniqueness is enforced by partial unique indexes
    // (WHERE deleted_at IS NULL) created in migration 001. They are left out of
    // this schema so the ORM never sees a non-partial definition.
  })
);

// =============================================================================
// refresh_tokens
// =============================================================================

export const refreshTokens = sqliteTable(
  'refresh_tokens',
  {
    jti: text('jti').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id),
    expiresAt: timestamp('expires_at').notNull(),
    createdAt: timestamp('created_at').notNull(),
    revokedAt: timestamp('revoked_at'),
    replacedBy: text('replaced_by'),
  },
  (table) => ({
    userIdx: index('idx_refresh_tokens_user').on(table.userId, table.revokedAt),
    expiryIdx: index('idx_refresh_tokens_expires_at').on(table.expiresAt),
  })
);

// =============================================================================
// action_tokens (password reset / email verification)
// =============================================================================

export const ACTION_TOKEN_PURPOSES = ['password_reset', 'email_verification'] as const;

export const actionTokens = sqliteTable(
  'action_tokens',
  {
    id: text('id').primaryKey(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id),
    purpose: text('purpose', { enum: ACTION_TOKEN_PURPOSES }).notNull(),
    hashEnvelope: text('hash_envelope', { mode: 'json' }).$type<TokenHashEnvelope>().notNull(),
    createdAt: timestamp('created_at').notNull(),
    consumedAt: timestamp('consumed_at'),
  },
  (table) => ({
    outstandingIdx: index('idx_action_tokens_user_purpose').on(table.userId, table.purpose),
  })
);

export type UserRecord = typeof users.$inferSelect;
export type NewUserRecord = typeof users.$inferInsert;
export type RefreshTokenRecord = typeof refreshTokens.$inferSelect;
export type ActionTokenRecord = typeof actionTokens.$inferSelect;
export type ActionTokenPurpose = (typeof ACTION_TOKEN_PURPOSES)[number];
