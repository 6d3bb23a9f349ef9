import type { UserRole } from '@accounts/types';
import type { User } from './user-types.js';

export type UserStatusTransition =
  | { type: 'role_changed'; from: UserRole; to: UserRole }
  | { type: 'activated' }
  | { type: 'deactivated' }
  | { type: 'blocked' }
  | { type: 'unblocked' };

type StatusSnapshot = Pick<User, 'role' | 'isActive' | 'isBlocked'>;

/**
 * Transitions between two snapshots of the same account, in a fixed order:
 * role, activation, blocking. Equal snapshots yield no transitions.
 */
export function diffUserStatus(before: StatusSnapshot, after: StatusSnapshot): UserStatusTransition[] {
  const transitions: UserStatusTransition[] = [];

  if (before.role !== after.role) {
    transitions.push({ type: 'role_changed', from: before.role, to: after.role });
  }
  if (before.isActive !== after.isActive) {
    transitions.push({ type: after.isActive ? 'activated' : 'deactivated' });
  }
  if (before.isBlocked !== after.isBlocked) {
    transitions.push({ type: after.isBlocked ? 'blocked' : 'unblocked' });
  }

  return transitions;
}

/**
 * Transitions after which the account must lose every session
 */
export function requiresSessionRevocation(transitions: readonly UserStatusTransition[]): boolean {
  return transitions.some((transition) => transition.type === 'blocked' || transition.type === 'deactivated');
}

/**
 * Whether the account may log in or refresh a session
 */
export function isSessionEligible(user: Pick<User, 'isActive' | 'isBlocked' | 'deletedAt'> | null): boolean {
  return user !== null && user.isActive && !user.isBlocked && user.deletedAt === null;
}
