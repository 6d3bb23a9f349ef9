/**
 * Credential endpoints
 *
 * Registration, login, token refresh/logout, password change and reset,
 * email verification. Mounted at /auth.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { IssuedSession } from '@accounts/core';
import {
  EmailVerificationConfirmSchema,
  EmailVerificationRequestSchema,
  LoginSchema,
  LogoutSchema,
  PasswordChangeSchema,
  PasswordResetConfirmSchema,
  PasswordResetRequestSchema,
  RefreshTokenSchema,
  RegisterSchema,
  type TokenPairResponse,
} from '@accounts/types';
import { getPrincipal, requireAuth } from '../middleware/auth.js';
import { ipRateLimit } from '../middleware/rate-limit.js';
import { rejectInvalid, requestContext } from '../lib/validation.js';
import type { ApiServices } from '../services/index.js';
import type { AppBindings } from '../types/context.js';

export const PASSWORD_RESET_REQUESTED_MESSAGE =
  'If an account exists for that email, a password reset link has been sent.';
export const EMAIL_VERIFICATION_REQUESTED_MESSAGE =
  'If that email needs verification, a verification link has been sent.';

function toTokenPairResponse(session: IssuedSession): TokenPairResponse {
  return {
    access: session.access,
    refresh: session.refresh,
    access_expires_at: session.accessExpiresAt.toISOString(),
    refresh_expires_at: session.refreshExpiresAt.toISOString(),
  };
}

export function createAuthRoutes(services: Pick<ApiServices, 'accounts' | 'authLimiter'>) {
  const { accounts, authLimiter } = services;
  const authRoutes = new Hono<AppBindings>();

  const limitByIp = ipRateLimit(authLimiter, 'auth');
  const authenticated = requireAuth(accounts);
  const activeAccount = requireAuth(accounts, ['active', 'not_blocked']);

  authRoutes.post('/register', limitByIp, zValidator('json', RegisterSchema, rejectInvalid), async (c) => {
    const user = await accounts.register(c.req.valid('json'), requestContext(c));
    return c.json({ user }, 201);
  });

  authRoutes.post('/login', limitByIp, zValidator('json', LoginSchema, rejectInvalid), async (c) => {
    const result = await accounts.login(c.req.valid('json'), requestContext(c));
    return c.json({ user: result.user, ...toTokenPairResponse(result) });
  });

  authRoutes.post('/logout', authenticated, zValidator('json', LogoutSchema, rejectInvalid), async (c) => {
    await accounts.logout(getPrincipal(c), c.req.valid('json').refresh, requestContext(c));
    return c.body(null, 205);
  });

  authRoutes.post('/logout/all', authenticated, async (c) => {
    const revoked = await accounts.logoutEverywhere(getPrincipal(c), requestContext(c));
    return c.json({ revoked });
  });

  authRoutes.post('/token/refresh', limitByIp, zValidator('json', RefreshTokenSchema, rejectInvalid), async (c) => {
    const session = await accounts.refresh(c.req.valid('json').refresh, requestContext(c));
    return c.json(toTokenPairResponse(session));
  });

  authRoutes.post(
    '/password/change',
    activeAccount,
    zValidator('json', PasswordChangeSchema, rejectInvalid),
    async (c) => {
      await accounts.changePassword(getPrincipal(c), c.req.valid('json'), requestContext(c));
      return c.json({ message: 'Password updated. Please log in again.' });
    }
  );

  authRoutes.post(
    '/password/reset',
    limitByIp,
    zValidator('json', PasswordResetRequestSchema, rejectInvalid),
    async (c) => {
      await accounts.requestPasswordReset(c.req.valid('json').email, requestContext(c));
      return c.json({ message: PASSWORD_RESET_REQUESTED_MESSAGE });
    }
  );

  authRoutes.post(
    '/password/reset/confirm',
    limitByIp,
    zValidator('json', PasswordResetConfirmSchema, rejectInvalid),
    async (c) => {
      await accounts.confirmPasswordReset(c.req.valid('json'), requestContext(c));
      return c.json({ message: 'Password has been reset. Please log in.' });
    }
  );

  authRoutes.post(
    '/email/verify',
    limitByIp,
    zValidator('json', EmailVerificationRequestSchema, rejectInvalid),
    async (c) => {
      await accounts.requestEmailVerification(c.req.valid('json').email, requestContext(c));
      return c.json({ message: EMAIL_VERIFICATION_REQUESTED_MESSAGE });
    }
  );

  authRoutes.post(
    '/email/verify/confirm',
    limitByIp,
    zValidator('json', EmailVerificationConfirmSchema, rejectInvalid),
    async (c) => {
      const user = await accounts.confirmEmailVerification(c.req.valid('json'), requestContext(c));
      return c.json({ user });
    }
  );

  return authRoutes;
}
