import type { Principal } from '@accounts/auth-core';
import type { UserResponse, UserSummary } from '@accounts/types';
import type { User } from './user-types.js';

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    recovery_email: user.recoveryEmail,
    phone_number: user.phoneNumber,
    address: user.address,
    country: user.country,
    bio: user.bio,
    role: user.role,
    is_email_verified: user.isEmailVerified,
    is_active: user.isActive,
    is_blocked: user.isBlocked,
    last_login: user.lastLoginAt ? user.lastLoginAt.toISOString() : null,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt.toISOString(),
  };
}

export function toUserSummary(user: User): UserSummary {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    role: user.role,
    is_active: user.isActive,
    is_blocked: user.isBlocked,
    created_at: user.createdAt.toISOString(),
  };
}

export function toPrincipal(user: User): Principal {
  return {
    id: user.id,
    role: user.role,
    isActive: user.isActive,
    isBlocked: user.isBlocked,
    isEmailVerified: user.isEmailVerified,
  };
}
