/**
 * User Domain Types
 *
 * The credential store contract and its inputs.
 */

import type { UserRecord } from '@accounts/database';
import type { UserRole } from '@accounts/types';

export type User = UserRecord;

export interface UserProfileData {
  recoveryEmail?: string | null;
  phoneNumber?: string | null;
  address?: string | null;
  country?: string | null;
  bio?: string | null;
}

export interface CreateUserData {
  email: string;
  username: string;
  passwordHash: string;
  role: UserRole;
  profile: UserProfileData;
}

export interface UpdateUserData extends UserProfileData {
  username?: string;
  passwordHash?: string;
  isEmailVerified?: boolean;
}

export interface UserStatusPatch {
  role?: UserRole;
  isActive?: boolean;
  isBlocked?: boolean;
}

export interface UserStatusChange {
  before: User;
  after: User;
}

export interface ListUsersParams {
  limit: number;
  offset: number;
}

/**
 * Persistence contract for user accounts. Soft-deleted users are invisible
 * to every read. Unique violations surface as DuplicateResourceError,
 * other store failures as TransientDependencyError.
 */
export interface CredentialStore {
  create(data: CreateUserData): Promise<User>;
  findByEmail(email: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  list(params: ListUsersParams): Promise<User[]>;
  count(): Promise<number>;
  update(id: string, data: UpdateUserData): Promise<User>;
  updateStatus(id: string, patch: UserStatusPatch): Promise<UserStatusChange>;
  recordLogin(id: string, at: Date): Promise<void>;
  softDelete(id: string): Promise<User>;
  verifySecret(user: User, plaintext: string): Promise<boolean>;
}
