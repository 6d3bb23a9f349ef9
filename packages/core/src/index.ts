/**
 * @accounts/core - Account domain
 *
 * Credential store, refresh token store, action tokens and the account
 * orchestrator consumed by the API layer.
 */

export * from './accounts/index.js';
export * from './users/index.js';
export * from './sessions/index.js';
export * from './verification/index.js';
export * from './maintenance/index.js';
