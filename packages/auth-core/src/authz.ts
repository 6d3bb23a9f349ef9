import type { UserRole } from '@accounts/types';
import { AuthorizationError, UnauthorizedError } from './errors.js';
import type { AuthzEvaluator } from './interfaces.js';
import type { Principal } from './types.js';

export const CAPABILITIES = [
  'authenticated',
  'active',
  'not_blocked',
  'verified',
  'admin',
  'staff',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export const STAFF_ROLES = ['admin', 'moderator'] as const satisfies readonly UserRole[];

function isStaffRole(role: UserRole): boolean {
  return STAFF_ROLES.some((staffRole) => staffRole === role);
}

// A principal exists only once its access token has been verified, so
// `authenticated` holds for any principal that reaches these rules.
export const CAPABILITY_RULES = {
  authenticated: () => true,
  active: (principal) => principal.isActive,
  not_blocked: (principal) => !principal.isBlocked,
  verified: (principal) => principal.isActive && principal.isEmailVerified,
  admin: (principal) => principal.role === 'admin',
  staff: (principal) => isStaffRole(principal.role),
} as const satisfies Record<Capability, (principal: Principal) => boolean>;

export function isCapability(value: unknown): value is Capability {
  return typeof value === 'string' && CAPABILITIES.some((capability) => capability === value);
}

export const authz: AuthzEvaluator = {
  evaluate(principal, capabilities) {
    if (!principal) {
      return { allowed: false, reason: 'unauthenticated' };
    }
    // Blocked accounts fail every capability, `authenticated` included
    if (principal.isBlocked) {
      return { allowed: false, reason: 'forbidden' };
    }
    for (const capability of capabilities) {
      if (!CAPABILITY_RULES[capability](principal)) {
        return { allowed: false, reason: 'forbidden' };
      }
    }
    return { allowed: true };
  },

  can(principal, capability) {
    return this.evaluate(principal, [capability]).allowed;
  },

  require(principal, capabilities): asserts principal is Principal {
    const decision = this.evaluate(principal, capabilities);
    if (decision.allowed) {
      return;
    }
    if (decision.reason === 'unauthenticated') {
      throw new UnauthorizedError('Authentication credentials were not provided');
    }
    throw new AuthorizationError('You do not have permission to perform this action');
  },

  canAccessOwned(principal, ownerId) {
    if (!principal || principal.isBlocked) {
      return false;
    }
    return principal.role === 'admin' || principal.id === ownerId;
  },

  requireOwnerOrAdmin(principal, ownerId): asserts principal is Principal {
    if (!principal) {
      throw new UnauthorizedError('Authentication credentials were not provided');
    }
    if (!this.canAccessOwned(principal, ownerId)) {
      throw new AuthorizationError('You do not have permission to perform this action');
    }
  },
};
