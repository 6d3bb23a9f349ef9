import { PASSWORD_MAX_LENGTH, PASSWORD_MIN_LENGTH } from './constants.js';
import commonPasswordList from './data/common-passwords.json' with { type: 'json' };

export type PasswordContext = {
  email?: string | null;
  username?: string | null;
};

const commonPasswords = new Set(commonPasswordList.map((entry) => entry.toLowerCase()));

/**
 * Check a candidate password against the account password policy.
 *
 * Rules: 8-128 characters, at least one letter and one digit, not entirely
 * numeric, not a common password, not the username or the email's local part.
 *
 * @returns Human-readable issues; empty when the password is acceptable
 */
export function validatePasswordStrength(password: string, context: PasswordContext = {}): string[] {
  const issues: string[] = [];

  if (password.length < PASSWORD_MIN_LENGTH) {
    issues.push(`Password must be at least ${PASSWORD_MIN_LENGTH} characters`);
  }
  if (password.length > PASSWORD_MAX_LENGTH) {
    issues.push(`Password must be at most ${PASSWORD_MAX_LENGTH} characters`);
  }
  if (/^\d+$/.test(password)) {
    issues.push('Password cannot be entirely numeric');
  } else if (!/[A-Za-z]/.test(password) || !/\d/.test(password)) {
    issues.push('Password must contain at least one letter and one number');
  }

  const lowered = password.toLowerCase();
  if (commonPasswords.has(lowered)) {
    issues.push('Password is too common');
  }

  const localPart = context.email?.split('@')[0]?.toLowerCase();
  const username = context.username?.toLowerCase();
  if ((localPart && lowered === localPart) || (username && lowered === username)) {
    issues.push('Password is too similar to your account details');
  }

  return issues;
}
