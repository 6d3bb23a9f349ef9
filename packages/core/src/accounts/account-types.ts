/**
 * Account Domain Types
 */

import type { UserResponse, UserSummary } from '@accounts/types';

export interface RequestContext {
  ip?: string;
  requestId?: string;
}

export interface AccountServiceConfig {
  /** Base URL of the web client; reset and verification links point here */
  appUrl: string;
  /** Minimum duration of reset/verification responses, in milliseconds */
  enumerationFloorMs: number;
}

export interface IssuedSession {
  access: string;
  refresh: string;
  accessExpiresAt: Date;
  refreshExpiresAt: Date;
}

export interface LoginResult extends IssuedSession {
  user: UserResponse;
}

export interface UserListResult {
  users: UserSummary[];
  total: number;
  limit: number;
  offset: number;
}
