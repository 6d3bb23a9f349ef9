/**
 * @accounts/auth-core
 *
 * Token issuance and verification, refresh rotation/revocation,
 * the capability evaluator and the error taxonomy shared by every layer.
 */

export * from './types.js';
export * from './interfaces.js';
export * from './errors.js';
export * from './authz.js';
export {
  JWT_ALGORITHMS,
  loadAuthCoreConfig,
  type AsymmetricAlgorithm,
  type AuthCoreEnvironment,
  type JwtAlgorithm,
  type SigningKeyConfig,
  type VerificationKeyConfig,
} from './config.js';
export {
  SigningKeyStore,
  buildKeyStore,
  buildSigningKey,
  buildVerificationKey,
  signToken,
  type KeyMaterial,
  type SigningKey,
  type SignTokenParams,
} from './signing.js';
export {
  INVALID_REFRESH_TOKEN_MESSAGE,
  TokenService,
  createTokenService,
  type CreateTokenServiceOptions,
  type RevokeOptions,
  type TokenServiceConfig,
} from './token-service.js';
