/**
 * In-process account stack for tests: in-memory SQLite, HS256 keys,
 * memory rate limiters and a notifier that records what it would send.
 */

import {
  type AccountNotifier,
  type AuthEventInput,
  type AuthEventSink,
  NotificationDispatcher,
  type SendPasswordResetEmailParams,
  type SendVerificationEmailParams,
  type SendWelcomeEmailParams,
} from '@accounts/auth';
import { type AuthCoreEnvironment, TokenService, buildKeyStore } from '@accounts/auth-core';
import { createDatabase } from '@accounts/database';
import { createLogger } from '@accounts/observability';
import { MemoryRateLimitStore, RateLimitPresets, createRateLimiter } from '@accounts/rate-limit';
import { AccountService } from '../accounts/account-service.js';
import { RefreshTokenRepository } from '../sessions/refresh-token-repository.js';
import { UserRepository } from '../users/user-repository.js';
import { isSessionEligible } from '../users/user-status.js';
import { VerificationRepository } from '../verification/verification-repository.js';
import { VerificationService } from '../verification/verification-service.js';

export const silentLogger = createLogger({ level: 'silent' });

export const TEST_PASSWORD = 'correct-horse-42';

export function buildAuthConfig(overrides: Partial<AuthCoreEnvironment> = {}): AuthCoreEnvironment {
  return {
    issuer: 'https://accounts.test',
    audience: 'https://accounts.test/api',
    keyId: 'test',
    signingKey: { algorithm: 'HS256', secret: 'test-secret-for-signing-access-tokens' },
    verificationKeys: [],
    accessTokenTtlSeconds: 3600,
    refreshTokenTtlSeconds: 7 * 24 * 3600,
    rotateRefreshTokens: true,
    clockToleranceSeconds: 0,
    ...overrides,
  };
}

export type SentEmail =
  | ({ kind: 'welcome' } & SendWelcomeEmailParams)
  | ({ kind: 'password_reset' } & SendPasswordResetEmailParams)
  | ({ kind: 'email_verification' } & SendVerificationEmailParams);

export class RecordingNotifier implements AccountNotifier {
  readonly sent: SentEmail[] = [];

  async sendWelcomeEmail(params: SendWelcomeEmailParams): Promise<void> {
    this.sent.push({ kind: 'welcome', ...params });
  }

  async sendPasswordResetEmail(params: SendPasswordResetEmailParams): Promise<void> {
    this.sent.push({ kind: 'password_reset', ...params });
  }

  async sendVerificationEmail(params: SendVerificationEmailParams): Promise<void> {
    this.sent.push({ kind: 'email_verification', ...params });
  }

  /** Token from the most recent link of the given kind */
  lastToken(kind: 'password_reset' | 'email_verification'): string {
    for (let index = this.sent.length - 1; index >= 0; index--) {
      const email = this.sent[index];
      if (email?.kind === 'password_reset' && kind === 'password_reset') {
        return new URL(email.resetUrl).searchParams.get('token') ?? '';
      }
      if (email?.kind === 'email_verification' && kind === 'email_verification') {
        return new URL(email.verificationUrl).searchParams.get('token') ?? '';
      }
    }
    throw new Error(`No ${kind} email was sent`);
  }
}

export class RecordingEvents implements AuthEventSink {
  readonly events: AuthEventInput[] = [];

  emit(event: AuthEventInput): void {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}

export type AccountsHarness = Awaited<ReturnType<typeof createAccountsHarness>>;

export async function createAccountsHarness(options: { authConfig?: Partial<AuthCoreEnvironment> } = {}) {
  const connection = createDatabase(':memory:');
  const users = new UserRepository(connection.db);
  const refreshTokens = new RefreshTokenRepository(connection.db);
  const verification = new VerificationService({
    store: new VerificationRepository(connection.db),
    ttls: { passwordResetTtlMinutes: 60, emailVerificationTtlHours: 24 },
  });

  const authConfig = buildAuthConfig(options.authConfig);
  const tokens = new TokenService({
    keyStore: await buildKeyStore(authConfig),
    config: authConfig,
    store: refreshTokens,
    isEligible: async (userId) => isSessionEligible(await users.findById(userId)),
  });

  const notifier = new RecordingNotifier();
  const events = new RecordingEvents();
  const notifications = new NotificationDispatcher(notifier, { timeoutMs: 1000, logger: silentLogger, events });
  const sleeps: number[] = [];

  const accounts = new AccountService({
    users,
    tokens,
    verification,
    loginLimiter: createRateLimiter(new MemoryRateLimitStore(), RateLimitPresets.LOGIN),
    recoveryLimiter: createRateLimiter(new MemoryRateLimitStore(), RateLimitPresets.ACCOUNT_RECOVERY),
    notifications,
    events,
    config: { appUrl: 'https://app.example.com', enumerationFloorMs: 200 },
    logger: silentLogger,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });

  return {
    connection,
    users,
    refreshTokens,
    verification,
    tokens,
    notifier,
    notifications,
    events,
    sleeps,
    accounts,
    close: () => connection.close(),
  };
}

export function registrationInput(overrides: Partial<{ email: string; username: string; password: string }> = {}) {
  const password = overrides.password ?? TEST_PASSWORD;
  return {
    email: overrides.email ?? 'alice@example.com',
    username: overrides.username ?? 'alice',
    password,
    password_confirm: password,
  };
}
