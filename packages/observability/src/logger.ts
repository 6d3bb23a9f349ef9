import pino from 'pino';

/**
 * Redact sensitive data from logs
 * - Authorization headers (Bearer tokens)
 * - Passwords, password hashes and secrets
 * - Access, refresh and single-use action tokens
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.Authorization',
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'password',
  'old_password',
  'new_password',
  'new_password_confirm',
  'password_confirm',
  'passwordHash',
  '*.password',
  '*.passwordHash',
  'token',
  '*.token',
  'access',
  'refresh',
  'secret',
  'apiKey',
  'api_key',
];

const JWT_PATTERN = /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;
const ACTION_TOKEN_PATTERN = /\b(pr|ev)_[0-9a-fA-F-]{36}\.[A-Za-z0-9_-]+/g;

export function redactTokens(value: string): string {
  if (value.startsWith('Bearer ')) {
    return 'Bearer [REDACTED]';
  }
  return value
    .replace(JWT_PATTERN, '[REDACTED_JWT]')
    .replace(ACTION_TOKEN_PATTERN, '$1_[REDACTED]');
}

function redactValue(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value === 'string') {
    return redactTokens(value);
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redactValue(entry, seen));
  }
  if (value && typeof value === 'object' && !(value instanceof Error) && !(value instanceof Date)) {
    if (seen.has(value)) {
      return '[Circular]';
    }
    seen.add(value);
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = redactValue(entry, seen);
    }
    seen.delete(value);
    return result;
  }
  return value;
}

/**
 * Recursively mask token-shaped strings anywhere in a log object
 */
export function redactObjectTokens(object: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(object)) {
    result[key] = redactValue(entry, seen);
  }
  return result;
}

export type Logger = pino.Logger;

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels (LOG_LEVEL)
 * - Path-based redaction plus token masking in every string field
 * - ISO 8601 timestamps
 *
 * A destination stream may be passed to capture output (tests use an in-memory array).
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log: redactObjectTokens,
    },
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
