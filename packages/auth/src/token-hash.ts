import crypto from 'node:crypto';

export interface TokenHashEnvelope {
  algo: 'hmac-sha256';
  keyId: string;
  hash: string;
  issuedAt: string;
  salt?: string;
  [key: string]: string | undefined;
}

const TOKEN_HASH_ALGO: TokenHashEnvelope['algo'] = 'hmac-sha256';
const OPAQUE_TOKEN_DELIMITER = '.';
const OPAQUE_TOKEN_PREFIX_DELIMITER = '_';
const DEFAULT_TOKEN_SECRET_BYTES = 32;
const DEFAULT_TOKEN_SALT_BYTES = 16;
const UUID_PATTERN =
  /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[1-5][0-9a-fA-F]{3}-[89abAB][0-9a-fA-F]{3}-[0-9a-fA-F]{12}$/;
const SECRET_PATTERN = /^[A-Za-z0-9_-]+$/;

type TokenHashKeyConfig = {
  keys: Record<string, string>;
  activeKeyId: string;
};

let keyConfig: TokenHashKeyConfig | null = null;

function unwrapQuotes(value: string): string {
  const trimmed = value.trim();
  return (trimmed.startsWith("'") && trimmed.endsWith("'")) ||
    (trimmed.startsWith('"') && trimmed.endsWith('"'))
    ? trimmed.slice(1, -1)
    : trimmed;
}

function parseTokenHashKeys(env: NodeJS.ProcessEnv): Record<string, string> {
  const rawKeys = env.TOKEN_HASH_KEYS;
  if (rawKeys) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(unwrapQuotes(rawKeys));
    } catch (error) {
      throw new Error('Failed to parse TOKEN_HASH_KEYS. Expected JSON object of { keyId: secret }.', {
        cause: error,
      });
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('TOKEN_HASH_KEYS must be a JSON object of { keyId: secret }');
    }
    const keys: Record<string, string> = {};
    for (const [keyId, secret] of Object.entries(parsed)) {
      if (typeof secret !== 'string' || !secret) {
        throw new Error(`TOKEN_HASH_KEYS.${keyId} must be a non-empty string`);
      }
      keys[keyId] = secret;
    }
    return keys;
  }

  // Local dev/test: reuse the JWT secret so env setup is not blocked
  const fallback = env.TOKEN_HASH_FALLBACK_SECRET || env.AUTH_JWT_SECRET;
  if (fallback) {
    return { v1: fallback };
  }

  throw new Error(
    'TOKEN_HASH_KEYS is required (JSON object of { keyId: secret }). ' +
      'Set TOKEN_HASH_KEYS or TOKEN_HASH_FALLBACK_SECRET/AUTH_JWT_SECRET in your environment.'
  );
}

/**
 * Load (or replace) the HMAC keys used for token hash envelopes.
 * Read lazily from the environment on first use when never called.
 */
export function configureTokenHashKeys(env: NodeJS.ProcessEnv = process.env): void {
  const keys = parseTokenHashKeys(env);
  const activeKeyId = env.TOKEN_HASH_ACTIVE_KEY_ID || Object.keys(keys)[0] || 'v1';
  if (!keys[activeKeyId]) {
    throw new Error(`TOKEN_HASH_ACTIVE_KEY_ID "${activeKeyId}" is not present in TOKEN_HASH_KEYS`);
  }
  keyConfig = { keys, activeKeyId };
}

function getKeyConfig(): TokenHashKeyConfig {
  if (!keyConfig) {
    configureTokenHashKeys();
  }
  if (!keyConfig) {
    throw new Error('Token hash keys are not configured');
  }
  return keyConfig;
}

function computeHash(secretKey: string, salt: string, tokenSecret: string): string {
  const hmac = crypto.createHmac('sha256', secretKey);
  if (salt) {
    hmac.update(salt);
    hmac.update(':');
  }
  hmac.update(tokenSecret);
  return hmac.digest('base64');
}

export function createTokenHashEnvelope(
  tokenSecret: string,
  options?: { keyId?: string; issuedAt?: Date; saltBytes?: number; salt?: string }
): TokenHashEnvelope {
  const config = getKeyConfig();
  const keyId = options?.keyId ?? config.activeKeyId;
  const secretKey = config.keys[keyId];

  if (!secretKey) {
    throw new Error(`Token hash key "${keyId}" is not configured. Check TOKEN_HASH_KEYS env variable.`);
  }

  const salt =
    options?.salt ??
    crypto.randomBytes(options?.saltBytes ?? DEFAULT_TOKEN_SALT_BYTES).toString('base64url');

  return {
    algo: TOKEN_HASH_ALGO,
    keyId,
    hash: computeHash(secretKey, salt, tokenSecret),
    issuedAt: (options?.issuedAt ?? new Date()).toISOString(),
    salt,
  };
}

function isHashEnvelope(value: unknown): value is TokenHashEnvelope {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    record.algo === TOKEN_HASH_ALGO &&
    typeof record.keyId === 'string' &&
    typeof record.hash === 'string' &&
    (record.salt === undefined || typeof record.salt === 'string')
  );
}

/**
 * Constant-time check of a presented secret against a stored envelope.
 * Envelopes signed with a retired key id never verify.
 */
export function verifyTokenSecret(tokenSecret: string, envelope: unknown): envelope is TokenHashEnvelope {
  if (!isHashEnvelope(envelope)) {
    return false;
  }

  const secretKey = getKeyConfig().keys[envelope.keyId];
  if (!secretKey) {
    return false;
  }

  const computed = Buffer.from(computeHash(secretKey, envelope.salt ?? '', tokenSecret));
  const stored = Buffer.from(envelope.hash);
  if (computed.length !== stored.length) {
    return false;
  }
  return crypto.timingSafeEqual(computed, stored);
}

export interface OpaqueToken {
  tokenId: string;
  tokenSecret: string;
  value: string;
  prefix: string;
}

/**
 * Opaque single-use token: `<prefix>_<uuid>.<secret>`, secret is 32 random bytes base64url
 */
export function createOpaqueToken(options: { prefix: string; secretLength?: number }): OpaqueToken {
  const secretLength = options.secretLength ?? DEFAULT_TOKEN_SECRET_BYTES;
  const tokenId = crypto.randomUUID();
  const tokenSecret = crypto.randomBytes(secretLength).toString('base64url');
  return {
    tokenId,
    tokenSecret,
    value: `${options.prefix}${OPAQUE_TOKEN_PREFIX_DELIMITER}${tokenId}${OPAQUE_TOKEN_DELIMITER}${tokenSecret}`,
    prefix: options.prefix,
  };
}

/**
 * Split an opaque token into id and secret.
 * Splits on the first `_` and then the first `.`, so the base64url secret may contain `_`.
 */
export function parseOpaqueToken(
  token: string,
  options?: { expectedPrefix?: string | string[] }
): { tokenId: string; tokenSecret: string; prefix: string } | null {
  if (!token || typeof token !== 'string') {
    return null;
  }

  const prefixEnd = token.indexOf(OPAQUE_TOKEN_PREFIX_DELIMITER);
  if (prefixEnd <= 0) {
    return null;
  }
  const prefix = token.slice(0, prefixEnd);
  const rest = token.slice(prefixEnd + 1);

  const idEnd = rest.indexOf(OPAQUE_TOKEN_DELIMITER);
  if (idEnd <= 0 || idEnd === rest.length - 1) {
    return null;
  }
  const tokenId = rest.slice(0, idEnd);
  const tokenSecret = rest.slice(idEnd + 1);

  const expectedPrefixes = options?.expectedPrefix
    ? Array.isArray(options.expectedPrefix)
      ? options.expectedPrefix
      : [options.expectedPrefix]
    : null;
  if (expectedPrefixes && !expectedPrefixes.includes(prefix)) {
    return null;
  }
  if (!/^[a-z]+$/i.test(prefix) || !UUID_PATTERN.test(tokenId) || !SECRET_PATTERN.test(tokenSecret)) {
    return null;
  }

  return { tokenId, tokenSecret, prefix };
}
