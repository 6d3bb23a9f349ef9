/**
 * User schemas
 *
 * Role vocabulary, profile updates and the public user shape returned by the API.
 * Wire fields are snake_case.
 */

import { z } from 'zod';

export const USER_ROLES = ['admin', 'moderator', 'user'] as const;

export const UserRoleSchema = z.enum(USER_ROLES);

export type UserRole = z.infer<typeof UserRoleSchema>;

export function isUserRole(value: unknown): value is UserRole {
  return UserRoleSchema.safeParse(value).success;
}

// Letters, digits and @ . + - _ only
export const USERNAME_PATTERN = /^[\w.@+-]+$/;

export const UsernameSchema = z
  .string()
  .trim()
  .min(1, 'Username is required')
  .max(150, 'Username must be 150 characters or less')
  .regex(USERNAME_PATTERN, 'Username may contain only letters, digits and @/./+/-/_');

export const ProfileFieldsSchema = z.object({
  recovery_email: z.string().trim().email('Invalid recovery email address').nullish(),
  phone_number: z.string().trim().max(20, 'Phone number must be 20 characters or less').nullish(),
  address: z.string().trim().max(500, 'Address must be 500 characters or less').nullish(),
  country: z.string().trim().max(100, 'Country must be 100 characters or less').nullish(),
});

export type ProfileFields = z.infer<typeof ProfileFieldsSchema>;

export const ProfileUpdateSchema = ProfileFieldsSchema.extend({
  username: UsernameSchema.optional(),
  bio: z.string().trim().max(2000, 'Bio must be 2000 characters or less').nullish(),
}).strict();

export type ProfileUpdateInput = z.infer<typeof ProfileUpdateSchema>;

export const AdminUserUpdateSchema = z
  .object({
    role: UserRoleSchema.optional(),
    is_active: z.boolean().optional(),
    is_blocked: z.boolean().optional(),
  })
  .strict()
  .refine(
    (value) => value.role !== undefined || value.is_active !== undefined || value.is_blocked !== undefined,
    'At least one of role, is_active or is_blocked is required'
  );

export type AdminUserUpdateInput = z.infer<typeof AdminUserUpdateSchema>;

export const UserListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export type UserListQuery = z.infer<typeof UserListQuerySchema>;

// Public user representation (never carries the secret hash)
export const UserResponseSchema = z.object({
  id: z.string().uuid(),
  email: z.string().email(),
  username: z.string(),
  recovery_email: z.string().nullable(),
  phone_number: z.string().nullable(),
  address: z.string().nullable(),
  country: z.string().nullable(),
  bio: z.string().nullable(),
  role: UserRoleSchema,
  is_email_verified: z.boolean(),
  is_active: z.boolean(),
  is_blocked: z.boolean(),
  last_login: z.string().datetime().nullable(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
});

export type UserResponse = z.infer<typeof UserResponseSchema>;

export const UserSummarySchema = UserResponseSchema.pick({
  id: true,
  username: true,
  email: true,
  role: true,
  is_active: true,
  is_blocked: true,
  created_at: true,
});

export type UserSummary = z.infer<typeof UserSummarySchema>;
