/**
 * Users Domain
 *
 * Credential store, status transitions and the public user mappers
 */

export { UserRepository, translateStoreError } from './user-repository.js';
export { toPrincipal, toUserResponse, toUserSummary } from './user-mapper.js';
export {
  diffUserStatus,
  isSessionEligible,
  requiresSessionRevocation,
  type UserStatusTransition,
} from './user-status.js';
export type {
  CreateUserData,
  CredentialStore,
  ListUsersParams,
  UpdateUserData,
  User,
  UserProfileData,
  UserStatusChange,
  UserStatusPatch,
} from './user-types.js';
