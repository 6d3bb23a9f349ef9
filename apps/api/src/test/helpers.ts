/**
 * HTTP test helpers
 *
 * Builds the real service graph over in-memory SQLite with HS256 keys,
 * memory rate limits and a notifier that records instead of sending.
 */

import type {
  AccountNotifier,
  SendPasswordResetEmailParams,
  SendVerificationEmailParams,
  SendWelcomeEmailParams,
} from '@accounts/auth';
import type { AuthCoreEnvironment } from '@accounts/auth-core';
import { createLogger } from '@accounts/observability';
import { MemoryRateLimitStore } from '@accounts/rate-limit';
import { TokenPairResponseSchema, UserResponseSchema } from '@accounts/types';
import type { Env, Hono } from 'hono';
import { z } from 'zod';
import { createApp } from '../app.js';
import { loadApiConfig } from '../config.js';
import { createServices } from '../services/index.js';

export const silentLogger = createLogger({ level: 'silent' });

export const TEST_PASSWORD = 'correct-horse-42';

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

export function buildTestAuthConfig(overrides: Partial<AuthCoreEnvironment> = {}): AuthCoreEnvironment {
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

export type TestContext = Awaited<ReturnType<typeof createTestContext>>;

export async function createTestContext(env: Record<string, string> = {}) {
  const config = loadApiConfig({
    DATABASE_URL: ':memory:',
    APP_URL: 'https://app.example.com',
    AUTH_ENUMERATION_FLOOR_MS: '0',
    PURGE_INTERVAL_MINUTES: '0',
    RATE_LIMIT_AUTH_PER_MINUTE: '1000',
    ...env,
  });
  const notifier = new RecordingNotifier();
  const services = await createServices(config, {
    authConfig: buildTestAuthConfig(),
    notifier,
    rateLimitStore: new MemoryRateLimitStore(),
    logger: silentLogger,
    sleep: async () => {},
  });

  return {
    app: createApp(services),
    services,
    notifier,
    close: () => services.close(),
  };
}

export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Make an HTTP request to the Hono app
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {} } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  return app.request(`http://localhost${path}`, init);
}

/**
 * Make an authenticated HTTP request with a Bearer access token.
 */
export async function makeAuthenticatedRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  accessToken: string,
  options: RequestOptions = {}
): Promise<Response> {
  return makeRequest(app, method, path, {
    ...options,
    headers: {
      ...(options.headers ?? {}),
      Authorization: `Bearer ${accessToken}`,
    },
  });
}

export const ErrorBodySchema = z.object({
  error: z.string(),
  message: z.string(),
  issues: z.array(z.object({ field: z.string().optional(), message: z.string() })).optional(),
});

export const LoginBodySchema = TokenPairResponseSchema.extend({ user: UserResponseSchema });

export const MessageBodySchema = z.object({ message: z.string() });

/**
 * Parse a response body with the schema the endpoint promises
 */
export async function readJson<T extends z.ZodTypeAny>(response: Response, schema: T): Promise<z.infer<T>> {
  return schema.parse(await response.json());
}

export async function registerUser(
  context: TestContext,
  overrides: Partial<{ email: string; username: string; password: string }> = {}
) {
  const password = overrides.password ?? TEST_PASSWORD;
  const response = await makeRequest(context.app, 'POST', '/auth/register', {
    body: {
      email: overrides.email ?? 'alice@example.com',
      username: overrides.username ?? 'alice',
      password,
      password_confirm: password,
    },
  });
  if (response.status !== 201) {
    throw new Error(`Registration failed with ${response.status}`);
  }
  const { user } = await readJson(response, z.object({ user: UserResponseSchema }));
  return user;
}

export async function loginUser(context: TestContext, email = 'alice@example.com', password = TEST_PASSWORD) {
  const response = await makeRequest(context.app, 'POST', '/auth/login', { body: { email, password } });
  if (response.status !== 200) {
    throw new Error(`Login failed with ${response.status}`);
  }
  return readJson(response, LoginBodySchema);
}

/**
 * Register, grant the admin role directly in the store, and log in
 */
export async function createAdmin(context: TestContext, email = 'root@example.com', username = 'root') {
  const user = await registerUser(context, { email, username });
  await context.services.users.updateStatus(user.id, { role: 'admin' });
  return { user, session: await loginUser(context, email) };
}
