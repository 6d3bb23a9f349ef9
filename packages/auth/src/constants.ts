/**
 * Authentication constants
 * Single source of truth for auth configuration defaults
 */

// Password hashing (scrypt cost parameter N)
export const SCRYPT_COST = 16384;

// Password policy bounds
export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;

// Session token lifetimes
export const ACCESS_TOKEN_TTL_MINUTES = 60;
export const REFRESH_TOKEN_TTL_DAYS = 7;

// Clock skew tolerance for token validation
export const CLOCK_SKEW_TOLERANCE_SECONDS = 60;

// Single-use action tokens
export const PASSWORD_RESET_TOKEN_PREFIX = 'pr';
export const EMAIL_VERIFICATION_TOKEN_PREFIX = 'ev';
export const PASSWORD_RESET_TTL_MINUTES = 60;
export const EMAIL_VERIFICATION_TTL_HOURS = 24;
