/**
 * Bearer authentication and capability gates for protected routes.
 */

import type { Context, MiddlewareHandler } from 'hono';
import { type Capability, type Principal, UnauthorizedError, authz } from '@accounts/auth-core';
import type { AccountService } from '@accounts/core';
import type { AppBindings } from '../types/context.js';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/**
 * Token from an `Authorization: Bearer <token>` header; null when the header is absent
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (header === undefined || header.trim() === '') {
    return null;
  }
  const match = BEARER_PATTERN.exec(header.trim());
  if (!match?.[1]) {
    throw new UnauthorizedError('Invalid authorization header');
  }
  return match[1];
}

/**
 * Resolve the bearer token to a principal and require every listed capability.
 * A missing token is a 401; a principal lacking a capability is a 403.
 */
export function requireAuth(
  accounts: AccountService,
  capabilities: readonly Capability[] = ['authenticated']
): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const token = extractBearerToken(c.req.header('authorization'));
    const principal = token ? await accounts.resolvePrincipal(token) : null;

    authz.require(principal, capabilities);
    c.set('principal', principal);

    await next();
  };
}

/**
 * The principal attached by requireAuth
 */
export function getPrincipal(c: Context<AppBindings>): Principal {
  const principal = c.get('principal');
  if (!principal) {
    throw new UnauthorizedError('Authentication credentials were not provided');
  }
  return principal;
}
