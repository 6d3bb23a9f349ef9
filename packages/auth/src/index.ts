/**
 * @accounts/auth
 *
 * Authentication primitives
 * - Password hashing/verification and the password policy
 * - Opaque single-use tokens with HMAC hash envelopes
 * - Auth event emitter
 * - Account email (Resend) and the fire-and-forget dispatcher
 *
 * Token issuance and authorization live in @accounts/auth-core.
 */

export { hashPassword, verifyPassword, getDummyPasswordHash } from './password.js';
export { validatePasswordStrength, type PasswordContext } from './password-policy.js';

export {
  SCRYPT_COST,
  PASSWORD_MIN_LENGTH,
  PASSWORD_MAX_LENGTH,
  ACCESS_TOKEN_TTL_MINUTES,
  REFRESH_TOKEN_TTL_DAYS,
  CLOCK_SKEW_TOLERANCE_SECONDS,
  PASSWORD_RESET_TOKEN_PREFIX,
  EMAIL_VERIFICATION_TOKEN_PREFIX,
  PASSWORD_RESET_TTL_MINUTES,
  EMAIL_VERIFICATION_TTL_HOURS,
} from './constants.js';

export {
  configureTokenHashKeys,
  createOpaqueToken,
  parseOpaqueToken,
  createTokenHashEnvelope,
  verifyTokenSecret,
} from './token-hash.js';
export type { TokenHashEnvelope, OpaqueToken } from './token-hash.js';

export {
  AuthEventEmitter,
  type AuthEvent,
  type AuthEventHandler,
  type AuthEventInput,
  type AuthEventSink,
  type AuthEventType,
} from './events.js';

export {
  LogNotifier,
  NotificationDispatcher,
  ResendNotifier,
  getRecipientLogId,
  renderPasswordResetEmail,
  renderVerificationEmail,
  renderWelcomeEmail,
  type AccountNotifier,
  type NotificationDispatcherOptions,
  type NotificationKind,
  type RenderedEmail,
  type ResendNotifierOptions,
  type SendPasswordResetEmailParams,
  type SendVerificationEmailParams,
  type SendWelcomeEmailParams,
} from './email.js';
