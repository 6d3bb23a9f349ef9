/**
 * Verification Domain
 *
 * Password reset and email verification tokens
 */

export { VerificationRepository } from './verification-repository.js';
export { VerificationService } from './verification-service.js';
export type {
  ActionToken,
  ActionTokenPurpose,
  ActionTokenStore,
  ActionTokenTtls,
  ConsumeActionTokenParams,
  CreateActionTokenData,
  IssuedActionToken,
} from './verification-types.js';
