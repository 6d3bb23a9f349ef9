import { describe, expect, it } from 'vitest';
import { diffUserStatus, isSessionEligible, requiresSessionRevocation } from '../user-status.js';

const base = { role: 'user', isActive: true, isBlocked: false } as const;

describe('diffUserStatus', () => {
  it('returns no transitions for equal snapshots', () => {
    expect(diffUserStatus(base, { ...base })).toEqual([]);
  });

  it('reports every change in role, activation, blocking order', () => {
    const transitions = diffUserStatus(base, { role: 'admin', isActive: false, isBlocked: true });

    expect(transitions).toEqual([
      { type: 'role_changed', from: 'user', to: 'admin' },
      { type: 'deactivated' },
      { type: 'blocked' },
    ]);
  });

  it('reports reactivation and unblocking', () => {
    const transitions = diffUserStatus(
      { role: 'user', isActive: false, isBlocked: true },
      { role: 'user', isActive: true, isBlocked: false }
    );

    expect(transitions).toEqual([{ type: 'activated' }, { type: 'unblocked' }]);
  });
});

describe('requiresSessionRevocation', () => {
  it('is true for blocking and deactivation only', () => {
    expect(requiresSessionRevocation([{ type: 'blocked' }])).toBe(true);
    expect(requiresSessionRevocation([{ type: 'deactivated' }])).toBe(true);
    expect(requiresSessionRevocation([{ type: 'role_changed', from: 'admin', to: 'user' }])).toBe(false);
    expect(requiresSessionRevocation([{ type: 'unblocked' }])).toBe(false);
  });
});

describe('isSessionEligible', () => {
  it('requires an active, unblocked, live account', () => {
    const live = { isActive: true, isBlocked: false, deletedAt: null };

    expect(isSessionEligible(live)).toBe(true);
    expect(isSessionEligible(null)).toBe(false);
    expect(isSessionEligible({ ...live, isActive: false })).toBe(false);
    expect(isSessionEligible({ ...live, isBlocked: true })).toBe(false);
    expect(isSessionEligible({ ...live, deletedAt: new Date() })).toBe(false);
  });
});
