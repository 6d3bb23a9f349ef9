import type { Capability } from './authz.js';
import type {
  Principal,
  RefreshTokenEntry,
  RegisterRefreshTokenInput,
  RotateRefreshTokenInput,
} from './types.js';

/**
 * Revoked refresh token ids. Revocation is one-way.
 */
export interface RevocationSet {
  contains(jti: string): Promise<boolean>;
  /** Returns false when the token was unknown or already revoked */
  add(jti: string, revokedAt: Date): Promise<boolean>;
  /** Revokes every live token of the user and returns how many were revoked */
  addAll(userId: string, revokedAt: Date): Promise<number>;
}

export interface RefreshTokenStore extends RevocationSet {
  register(input: RegisterRefreshTokenInput): Promise<void>;
  find(jti: string): Promise<RefreshTokenEntry | null>;
  /**
   * Revokes `previousJti` and registers `next` in one transaction.
   * Returns false (and writes nothing) when the previous token is no longer live.
   */
  rotate(input: RotateRefreshTokenInput): Promise<boolean>;
  purgeExpired(now: Date): Promise<number>;
}

export type AuthzDecision =
  | { allowed: true }
  | { allowed: false; reason: 'unauthenticated' | 'forbidden' };

export interface AuthzEvaluator {
  evaluate(principal: Principal | null, capabilities: readonly Capability[]): AuthzDecision;
  can(principal: Principal | null, capability: Capability): boolean;
  require(
    principal: Principal | null,
    capabilities: readonly Capability[]
  ): asserts principal is Principal;
  canAccessOwned(principal: Principal | null, ownerId: string): boolean;
  requireOwnerOrAdmin(principal: Principal | null, ownerId: string): asserts principal is Principal;
}
