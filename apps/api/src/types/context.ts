import type { Principal } from '@accounts/auth-core';

/**
 * Shared Hono context variables for API requests.
 */
export type ContextVariables = {
  requestId: string;
  clientIp: string;
  /** Set by requireAuth on protected routes */
  principal: Principal | null;
};

export type AppBindings = {
  Variables: ContextVariables;
};
