import { z } from 'zod';
import { ProfileFieldsSchema, UsernameSchema } from './user.schema.js';

const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .email('Invalid email address')
  .max(254, 'Email must be 254 characters or less');

// Shape only; strength rules live in the password policy
const PasswordSchema = z
  .string()
  .min(1, 'Password is required')
  .max(128, 'Password must be 128 characters or less');

// Registration schema; any role field is stripped, new accounts are always role=user
export const RegisterSchema = ProfileFieldsSchema.extend({
  email: EmailSchema,
  username: UsernameSchema,
  password: PasswordSchema,
  password_confirm: PasswordSchema,
});

export type RegisterInput = z.infer<typeof RegisterSchema>;

export const LoginSchema = z.object({
  email: EmailSchema,
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof LoginSchema>;

export const RefreshTokenSchema = z.object({
  refresh: z.string().min(1, 'Refresh token is required'),
});

export type RefreshTokenInput = z.infer<typeof RefreshTokenSchema>;

export const LogoutSchema = RefreshTokenSchema;

export type LogoutInput = RefreshTokenInput;

export const PasswordChangeSchema = z.object({
  old_password: z.string().min(1, 'Current password is required'),
  new_password: PasswordSchema,
  new_password_confirm: PasswordSchema,
});

export type PasswordChangeInput = z.infer<typeof PasswordChangeSchema>;

export const PasswordResetRequestSchema = z.object({
  email: EmailSchema,
});

export type PasswordResetRequestInput = z.infer<typeof PasswordResetRequestSchema>;

export const PasswordResetConfirmSchema = z.object({
  token: z.string().min(1, 'Token is required'),
  user_id: z.string().uuid('Invalid user id').optional(),
  new_password: PasswordSchema,
  new_password_confirm: PasswordSchema,
});

export type PasswordResetConfirmInput = z.infer<typeof PasswordResetConfirmSchema>;

export const EmailVerificationRequestSchema = z.object({
  email: EmailSchema,
});

export type EmailVerificationRequestInput = z.infer<typeof EmailVerificationRequestSchema>;

export const EmailVerificationConfirmSchema = z.object({
  token: z.string().min(1, 'Token is required'),
});

export type EmailVerificationConfirmInput = z.infer<typeof EmailVerificationConfirmSchema>;

export const TokenPairResponseSchema = z.object({
  access: z.string(),
  refresh: z.string(),
  access_expires_at: z.string().datetime(),
  refresh_expires_at: z.string().datetime(),
});

export type TokenPairResponse = z.infer<typeof TokenPairResponseSchema>;
