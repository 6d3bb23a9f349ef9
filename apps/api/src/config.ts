/**
 * API configuration
 *
 * Parsed once from the environment at start-up; an invalid value stops the process.
 * Token signing settings are read separately by `loadAuthCoreConfig`.
 */

import { z } from 'zod';

// Unset and empty variables both fall back to the default
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(fallback));

const optionalString = z.preprocess(blankToUndefined, z.string().min(1).optional());

const ApiEnvSchema = z
  .object({
    PORT: positiveInt(3000),
    DATABASE_URL: z.preprocess(blankToUndefined, z.string().min(1).default('file:./data/accounts.db')),
    APP_URL: z.preprocess(blankToUndefined, z.string().url().default('http://localhost:5173')),
    APP_NAME: z.preprocess(blankToUndefined, z.string().min(1).default('Accounts')),
    PASSWORD_RESET_TTL_MINUTES: positiveInt(60),
    EMAIL_VERIFICATION_TTL_HOURS: positiveInt(24),
    AUTH_ENUMERATION_FLOOR_MS: nonNegativeInt(200),
    NOTIFICATION_TIMEOUT_MS: positiveInt(5000),
    RESEND_API_KEY: optionalString,
    EMAIL_FROM: z.preprocess(blankToUndefined, z.string().min(1).default('Accounts <no-reply@localhost>')),
    UPSTASH_REDIS_REST_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    UPSTASH_REDIS_REST_TOKEN: optionalString,
    RATE_LIMIT_AUTH_PER_MINUTE: positiveInt(10),
    RATE_LIMIT_LOGIN_PER_MINUTE: positiveInt(5),
    RATE_LIMIT_RECOVERY_PER_HOUR: positiveInt(3),
    PURGE_INTERVAL_MINUTES: nonNegativeInt(60),
    AUTH_TRUSTED_PROXY_IPS: z.preprocess(blankToUndefined, z.string().default('')),
  })
  .refine(
    (env) => (env.UPSTASH_REDIS_REST_URL === undefined) === (env.UPSTASH_REDIS_REST_TOKEN === undefined),
    {
      message: 'UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set together',
      path: ['UPSTASH_REDIS_REST_TOKEN'],
    }
  );

export type ApiConfig = {
  port: number;
  databaseUrl: string;
  appUrl: string;
  appName: string;
  passwordResetTtlMinutes: number;
  emailVerificationTtlHours: number;
  enumerationFloorMs: number;
  notificationTimeoutMs: number;
  email: { apiKey: string; from: string } | null;
  redis: { url: string; token: string } | null;
  rateLimits: {
    authPerMinute: number;
    loginPerMinute: number;
    recoveryPerHour: number;
  };
  /** 0 disables the periodic purge */
  purgeIntervalMinutes: number;
  /** Proxies whose X-Real-IP / X-Forwarded-For headers are believed */
  trustedProxyIps: string[];
};

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const result = ApiEnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    appUrl: parsed.APP_URL,
    appName: parsed.APP_NAME,
    passwordResetTtlMinutes: parsed.PASSWORD_RESET_TTL_MINUTES,
    emailVerificationTtlHours: parsed.EMAIL_VERIFICATION_TTL_HOURS,
    enumerationFloorMs: parsed.AUTH_ENUMERATION_FLOOR_MS,
    notificationTimeoutMs: parsed.NOTIFICATION_TIMEOUT_MS,
    email: parsed.RESEND_API_KEY ? { apiKey: parsed.RESEND_API_KEY, from: parsed.EMAIL_FROM } : null,
    redis:
      parsed.UPSTASH_REDIS_REST_URL && parsed.UPSTASH_REDIS_REST_TOKEN
        ? { url: parsed.UPSTASH_REDIS_REST_URL, token: parsed.UPSTASH_REDIS_REST_TOKEN }
        : null,
    rateLimits: {
      authPerMinute: parsed.RATE_LIMIT_AUTH_PER_MINUTE,
      loginPerMinute: parsed.RATE_LIMIT_LOGIN_PER_MINUTE,
      recoveryPerHour: parsed.RATE_LIMIT_RECOVERY_PER_HOUR,
    },
    purgeIntervalMinutes: parsed.PURGE_INTERVAL_MINUTES,
    trustedProxyIps: parsed.AUTH_TRUSTED_PROXY_IPS.split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  };
}
