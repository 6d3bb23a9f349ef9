export { AccountService, INVALID_CREDENTIALS_MESSAGE } from './account-service.js';
export type {
  AccountServiceConfig,
  IssuedSession,
  LoginResult,
  RequestContext,
  UserListResult,
} from './account-types.js';
