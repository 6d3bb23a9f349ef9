import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

const DEFAULT_CLOCK_SKEW_TOLERANCE_SECONDS = 60;
const DEFAULT_ACCESS_TOKEN_TTL_MINUTES = 60;
const DEFAULT_REFRESH_TOKEN_TTL_DAYS = 7;
const MIN_SHARED_SECRET_LENGTH = 32;

export const JWT_ALGORITHMS = ['HS256', 'EdDSA', 'RS256'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];
export type AsymmetricAlgorithm = Exclude<JwtAlgorithm, 'HS256'>;

export type SigningKeyConfig =
  | { algorithm: 'HS256'; secret: string }
  | { algorithm: AsymmetricAlgorithm; privateKeyPem: string };

export type VerificationKeyConfig = {
  kid: string;
  alg: AsymmetricAlgorithm;
  publicKeyPem: string;
};

export type AuthCoreEnvironment = {
  issuer: string;
  audience: string;
  keyId: string;
  signingKey: SigningKeyConfig;
  verificationKeys: VerificationKeyConfig[];
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  rotateRefreshTokens: boolean;
  clockToleranceSeconds: number;
};

function isJwtAlgorithm(value: string): value is JwtAlgorithm {
  return JWT_ALGORITHMS.some((algorithm) => algorithm === value);
}

function decodeKeyMaterial(raw: string, source: string): string {
  const trimmed = raw.trim();
  if (trimmed.startsWith('-----BEGIN')) {
    return trimmed;
  }

  const decoded = Buffer.from(trimmed, 'base64').toString('utf8');
  if (!decoded.startsWith('-----BEGIN')) {
    throw new Error(`Invalid ${source} value. Expected PEM or base64-encoded PEM.`);
  }
  return decoded;
}

function readPrivateKeyFromEnv(env: NodeJS.ProcessEnv): string {
  if (env.AUTH_JWT_PRIVATE_KEY_FILE) {
    const path = resolve(env.AUTH_JWT_PRIVATE_KEY_FILE);
    return readFileSync(path, 'utf8');
  }

  const raw = env.AUTH_JWT_PRIVATE_KEY;
  if (!raw) {
    throw new Error(
      'AUTH_JWT_PRIVATE_KEY or AUTH_JWT_PRIVATE_KEY_FILE must be set for asymmetric signing.'
    );
  }

  return decodeKeyMaterial(raw, 'AUTH_JWT_PRIVATE_KEY');
}

function readSharedSecret(env: NodeJS.ProcessEnv): string {
  const secret = env.AUTH_JWT_SECRET;
  if (!secret) {
    throw new Error('AUTH_JWT_SECRET must be set when AUTH_JWT_ALGORITHM is HS256.');
  }
  if (secret.length < MIN_SHARED_SECRET_LENGTH) {
    throw new Error(`AUTH_JWT_SECRET must be at least ${MIN_SHARED_SECRET_LENGTH} characters.`);
  }
  return secret;
}

function readString(entry: object, field: string): string {
  const value: unknown = Reflect.get(entry, field);
  return typeof value === 'string' ? value.trim() : '';
}

function parseAdditionalPublicKeys(
  raw: string,
  defaultAlgorithm: AsymmetricAlgorithm
): VerificationKeyConfig[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error('AUTH_JWT_ADDITIONAL_PUBLIC_KEYS is not valid JSON', { cause: error });
  }

  if (!Array.isArray(parsed)) {
    throw new Error('AUTH_JWT_ADDITIONAL_PUBLIC_KEYS must be a JSON array');
  }

  return parsed.map((entry: unknown, index): VerificationKeyConfig => {
    const source = `AUTH_JWT_ADDITIONAL_PUBLIC_KEYS[${index}]`;
    if (!entry || typeof entry !== 'object') {
      throw new Error(`${source} must be an object with kid/publicKey fields`);
    }

    const kid = readString(entry, 'kid');
    const publicKey = readString(entry, 'publicKey');
    const alg = readString(entry, 'alg') || defaultAlgorithm;

    if (!kid) {
      throw new Error(`${source}.kid is required`);
    }
    if (!publicKey) {
      throw new Error(`${source}.publicKey is required`);
    }
    if (alg !== 'EdDSA' && alg !== 'RS256') {
      throw new Error(`${source}.alg must be "EdDSA" or "RS256"`);
    }

    return {
      kid,
      alg,
      publicKeyPem: decodeKeyMaterial(publicKey, `${source}.publicKey`),
    };
  });
}

function readAdditionalPublicKeys(
  env: NodeJS.ProcessEnv,
  defaultAlgorithm: AsymmetricAlgorithm
): VerificationKeyConfig[] {
  let raw = env.AUTH_JWT_ADDITIONAL_PUBLIC_KEYS;

  if (env.AUTH_JWT_ADDITIONAL_PUBLIC_KEYS_FILE) {
    const path = resolve(env.AUTH_JWT_ADDITIONAL_PUBLIC_KEYS_FILE);
    raw = readFileSync(path, 'utf8');
  }

  if (!raw || !raw.trim()) {
    return [];
  }

  return parseAdditionalPublicKeys(raw.trim(), defaultAlgorithm);
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer`);
  }
  return value;
}

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new Error(`${name} must be "true" or "false"`);
  }
}

export function loadAuthCoreConfig(env: NodeJS.ProcessEnv = process.env): AuthCoreEnvironment {
  const issuer = env.AUTH_JWT_ISSUER ?? env.APP_URL ?? 'http://localhost:3000';
  const audience = env.AUTH_JWT_AUDIENCE ?? `${issuer}/api`;
  const keyId = env.AUTH_JWT_KEY_ID ?? 'primary';
  const algorithm = env.AUTH_JWT_ALGORITHM ?? 'HS256';

  if (!isJwtAlgorithm(algorithm)) {
    throw new Error(`Unsupported AUTH_JWT_ALGORITHM value: ${algorithm}`);
  }

  const signingKey: SigningKeyConfig =
    algorithm === 'HS256'
      ? { algorithm, secret: readSharedSecret(env) }
      : { algorithm, privateKeyPem: readPrivateKeyFromEnv(env) };

  // Symmetric keys are never published, so extra verification keys only apply to PEM signing
  const verificationKeys = algorithm === 'HS256' ? [] : readAdditionalPublicKeys(env, algorithm);

  return {
    issuer,
    audience,
    keyId,
    signingKey,
    verificationKeys,
    accessTokenTtlSeconds:
      parsePositiveInt(
        'ACCESS_TOKEN_TTL_MINUTES',
        env.ACCESS_TOKEN_TTL_MINUTES,
        DEFAULT_ACCESS_TOKEN_TTL_MINUTES
      ) * 60,
    refreshTokenTtlSeconds:
      parsePositiveInt('REFRESH_TOKEN_TTL_DAYS', env.REFRESH_TOKEN_TTL_DAYS, DEFAULT_REFRESH_TOKEN_TTL_DAYS) *
      24 *
      60 *
      60,
    rotateRefreshTokens: parseBoolean('AUTH_ROTATE_REFRESH_TOKENS', env.AUTH_ROTATE_REFRESH_TOKENS, true),
    clockToleranceSeconds: parsePositiveInt(
      'AUTH_JWT_CLOCK_TOLERANCE_SECONDS',
      env.AUTH_JWT_CLOCK_TOLERANCE_SECONDS,
      DEFAULT_CLOCK_SKEW_TOLERANCE_SECONDS
    ),
  };
}
