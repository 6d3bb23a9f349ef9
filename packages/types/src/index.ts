/**
 * @accounts/types
 *
 * Zod schemas shared by the API and its clients.
 */

export * from './auth.schema.js';
export * from './user.schema.js';
