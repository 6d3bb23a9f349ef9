/**
 * Service Registry
 *
 * Dependency injection setup for domain services.
 * Builds one instance of each service for the lifetime of the process;
 * tests call it with in-process stand-ins for email, rate-limit storage and keys.
 */

import {
  type AccountNotifier,
  AuthEventEmitter,
  LogNotifier,
  NotificationDispatcher,
  ResendNotifier,
} from '@accounts/auth';
import {
  type AuthCoreEnvironment,
  type SigningKeyStore,
  type TokenService,
  createTokenService,
} from '@accounts/auth-core';
import {
  AccountService,
  RefreshTokenRepository,
  UserRepository,
  VerificationRepository,
  VerificationService,
  isSessionEligible,
} from '@accounts/core';
import { createDatabase, type DatabaseConnection } from '@accounts/database';
import { logger as defaultLogger, type Logger } from '@accounts/observability';
import {
  MemoryRateLimitStore,
  Redis,
  RedisRateLimitStore,
  type RateLimiter,
  type RateLimitStore,
  createRateLimiter,
} from '@accounts/rate-limit';
import type { ApiConfig } from '../config.js';

export type ApiServices = {
  config: ApiConfig;
  accounts: AccountService;
  users: UserRepository;
  tokens: TokenService;
  verification: VerificationService;
  notifications: NotificationDispatcher;
  events: AuthEventEmitter;
  keyStore: SigningKeyStore;
  /** Per-client-IP limit on the credential endpoints */
  authLimiter: RateLimiter;
  database: DatabaseConnection;
  logger: Logger;
  close: () => Promise<void>;
};

export type ServiceOverrides = {
  authConfig?: AuthCoreEnvironment;
  notifier?: AccountNotifier;
  rateLimitStore?: RateLimitStore;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

function createNotifier(config: ApiConfig, logger: Logger): AccountNotifier {
  if (!config.email) {
    logger.warn('RESEND_API_KEY not set; account emails are logged instead of sent');
    return new LogNotifier(logger);
  }
  return new ResendNotifier({
    apiKey: config.email.apiKey,
    from: config.email.from,
    appName: config.appName,
    logger,
  });
}

function createRateLimitStore(config: ApiConfig, logger: Logger): RateLimitStore {
  if (!config.redis) {
    logger.warn('UPSTASH_REDIS_REST_URL not set; rate limits are kept in process memory');
    return new MemoryRateLimitStore();
  }
  return new RedisRateLimitStore(new Redis({ url: config.redis.url, token: config.redis.token }));
}

export async function createServices(
  config: ApiConfig,
  overrides: ServiceOverrides = {}
): Promise<ApiServices> {
  const logger = overrides.logger ?? defaultLogger;
  const database = createDatabase(config.databaseUrl);

  const users = new UserRepository(database.db);
  const refreshTokens = new RefreshTokenRepository(database.db);
  const verification = new VerificationService({
    store: new VerificationRepository(database.db),
    ttls: {
      passwordResetTtlMinutes: config.passwordResetTtlMinutes,
      emailVerificationTtlHours: config.emailVerificationTtlHours,
    },
  });

  const { tokenService: tokens, keyStore } = await createTokenService({
    ...(overrides.authConfig !== undefined && { config: overrides.authConfig }),
    store: refreshTokens,
    isEligible: async (userId) => isSessionEligible(await users.findById(userId)),
  });

  const events = new AuthEventEmitter(logger);
  const notifications = new NotificationDispatcher(overrides.notifier ?? createNotifier(config, logger), {
    timeoutMs: config.notificationTimeoutMs,
    logger,
    events,
  });

  const rateLimitStore = overrides.rateLimitStore ?? createRateLimitStore(config, logger);
  const { rateLimits } = config;

  const accounts = new AccountService({
    users,
    tokens,
    verification,
    loginLimiter: createRateLimiter(rateLimitStore, { limit: rateLimits.loginPerMinute, window: 60 }),
    recoveryLimiter: createRateLimiter(rateLimitStore, { limit: rateLimits.recoveryPerHour, window: 3600 }),
    notifications,
    events,
    config: { appUrl: config.appUrl, enumerationFloorMs: config.enumerationFloorMs },
    logger,
    ...(overrides.sleep !== undefined && { sleep: overrides.sleep }),
  });

  return {
    config,
    accounts,
    users,
    tokens,
    verification,
    notifications,
    events,
    keyStore,
    authLimiter: createRateLimiter(rateLimitStore, { limit: rateLimits.authPerMinute, window: 60 }),
    database,
    logger,
    close: async () => {
      await notifications.drain();
      database.close();
    },
  };
}
