/**
 * User Repository
 *
 * Data access layer for user accounts.
 * Drizzle over SQLite; uniqueness is enforced by the partial unique indexes.
 */

import { randomUUID } from 'node:crypto';
import { and, asc, count, eq, isNull } from 'drizzle-orm';
import { verifyPassword } from '@accounts/auth';
import {
  AuthCoreError,
  DuplicateResourceError,
  NotFoundError,
  TransientDependencyError,
  ValidationError,
} from '@accounts/auth-core';
import {
  type AccountsDatabase,
  findSqliteError,
  findUniqueViolation,
  isCheckViolation,
  users,
} from '@accounts/database';
import type {
  CreateUserData,
  CredentialStore,
  ListUsersParams,
  UpdateUserData,
  User,
  UserStatusChange,
  UserStatusPatch,
} from './user-types.js';

const live = isNull(users.deletedAt);

function normalizeEmail(email: string): string {
  return email.toLowerCase().trim();
}

/**
 * Map driver failures onto the error taxonomy
 */
export function translateStoreError(error: unknown): unknown {
  if (error instanceof AuthCoreError) {
    return error;
  }

  const violation = findUniqueViolation(error);
  if (violation?.table === 'users' && (violation.column === 'email' || violation.column === 'username')) {
    return new DuplicateResourceError(violation.column, { cause: error });
  }

  if (isCheckViolation(error)) {
    return new ValidationError('Invalid user data', [], { cause: error });
  }

  if (findSqliteError(error)) {
    return new TransientDependencyError('Account store unavailable', { cause: error });
  }

  return error;
}

export class UserRepository implements CredentialStore {
  constructor(
    private db: AccountsDatabase,
    private now: () => Date = () => new Date()
  ) {}

  async create(data: CreateUserData): Promise<User> {
    const timestamp = this.now();
    const row = this.run(() =>
      this.db
        .insert(users)
        .values({
          id: randomUUID(),
          email: normalizeEmail(data.email),
          username: data.username,
          passwordHash: data.passwordHash,
          role: data.role,
          recoveryEmail: data.profile.recoveryEmail ?? null,
          phoneNumber: data.profile.phoneNumber ?? null,
          address: data.profile.address ?? null,
          country: data.profile.country ?? null,
          bio: data.profile.bio ?? null,
          createdAt: timestamp,
          updatedAt: timestamp,
        })
        .returning()
        .get()
    );
    if (!row) {
      throw new TransientDependencyError('Credential store did not return the new user');
    }
    return row;
  }

  /**
   * Find user by email (case-insensitive)
   */
  async findByEmail(email: string): Promise<User | null> {
    const row = this.run(() =>
      this.db
        .select()
        .from(users)
        .where(and(eq(users.email, normalizeEmail(email)), live))
        .get()
    );
    return row ?? null;
  }

  async findById(id: string): Promise<User | null> {
    const row = this.run(() =>
      this.db
        .select()
        .from(users)
        .where(and(eq(users.id, id), live))
        .get()
    );
    return row ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const row = this.run(() =>
      this.db
        .select()
        .from(users)
        .where(and(eq(users.username, username), live))
        .get()
    );
    return row ?? null;
  }

  /**
   * Oldest accounts first
   */
  async list(params: ListUsersParams): Promise<User[]> {
    return this.run(() =>
      this.db
        .select()
        .from(users)
        .where(live)
        .orderBy(asc(users.createdAt), asc(users.id))
        .limit(params.limit)
        .offset(params.offset)
        .all()
    );
  }

  async count(): Promise<number> {
    const row = this.run(() => this.db.select({ value: count() }).from(users).where(live).get());
    return row?.value ?? 0;
  }

  async update(id: string, data: UpdateUserData): Promise<User> {
    const row = this.run(() =>
      this.db
        .update(users)
        .set({ ...data, updatedAt: this.now() })
        .where(and(eq(users.id, id), live))
        .returning()
        .get()
    );
    if (!row) {
      throw new NotFoundError('User not found');
    }
    return row;
  }

  /**
   * Apply role/flag changes and return the row as it was before and after,
   * read and written in one transaction.
   */
  async updateStatus(id: string, patch: UserStatusPatch): Promise<UserStatusChange> {
    return this.run(() =>
      this.db.transaction((tx) => {
        const before = tx
          .select()
          .from(users)
          .where(and(eq(users.id, id), live))
          .get();
        if (!before) {
          throw new NotFoundError('User not found');
        }

        const after = tx
          .update(users)
          .set({ ...patch, updatedAt: this.now() })
          .where(eq(users.id, id))
          .returning()
          .get();
        if (!after) {
          throw new NotFoundError('User not found');
        }

        return { before, after };
      })
    );
  }

  async recordLogin(id: string, at: Date): Promise<void> {
    this.run(() => this.db.update(users).set({ lastLoginAt: at }).where(eq(users.id, id)).run());
  }

  async softDelete(id: string): Promise<User> {
    const timestamp = this.now();
    const row = this.run(() =>
      this.db
        .update(users)
        .set({ deletedAt: timestamp, updatedAt: timestamp })
        .where(and(eq(users.id, id), live))
        .returning()
        .get()
    );
    if (!row) {
      throw new NotFoundError('User not found');
    }
    return row;
  }

  async verifySecret(user: User, plaintext: string): Promise<boolean> {
    return verifyPassword(plaintext, user.passwordHash);
  }

  private run<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw translateStoreError(error);
    }
  }
}
