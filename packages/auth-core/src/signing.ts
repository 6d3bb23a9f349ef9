import { createPrivateKey, createPublicKey } from 'node:crypto';
import { type JWK, type JWTPayload, type KeyLike, SignJWT, exportJWK } from 'jose';
import type { AuthCoreEnvironment, JwtAlgorithm, VerificationKeyConfig } from './config.js';
import type { TokenClaims, TokenUse } from './types.js';

export type KeyMaterial = KeyLike | Uint8Array;

export type SigningKey = {
  kid: string;
  alg: JwtAlgorithm;
  signingKey: KeyMaterial | null;
  verificationKey: KeyMaterial;
  /** Public JWK; null for shared secrets, which are never published */
  jwk: JWK | null;
};

export class SigningKeyStore {
  private keyMap = new Map<string, SigningKey>();

  constructor(
    keys: SigningKey[],
    private activeKid: string
  ) {
    for (const key of keys) {
      if (this.keyMap.has(key.kid)) {
        throw new Error(`Duplicate signing key id detected: ${key.kid}`);
      }
      this.keyMap.set(key.kid, key);
    }
    if (!this.keyMap.size) {
      throw new Error('SigningKeyStore requires at least one key');
    }

    if (!this.keyMap.has(activeKid)) {
      throw new Error(`Active signing key "${activeKid}" not found`);
    }
  }

  getActiveKey(): SigningKey & { signingKey: KeyMaterial } {
    const key = this.keyMap.get(this.activeKid);
    if (!key) {
      throw new Error(`Active signing key "${this.activeKid}" not found`);
    }
    const { signingKey } = key;
    if (!signingKey) {
      throw new Error(`Active signing key "${this.activeKid}" is missing a private key`);
    }
    return { ...key, signingKey };
  }

  getVerificationKey(kid?: string): SigningKey {
    if (kid) {
      const key = this.keyMap.get(kid);
      if (key) {
        return key;
      }
    }
    return this.getActiveKey();
  }

  getAlgorithms(): JwtAlgorithm[] {
    return [...new Set(Array.from(this.keyMap.values(), (key) => key.alg))];
  }

  getJwks() {
    const keys: Array<JWK & { kid: string; use: 'sig'; alg: JwtAlgorithm }> = [];
    for (const key of this.keyMap.values()) {
      if (key.jwk) {
        keys.push({ ...key.jwk, kid: key.kid, use: 'sig', alg: key.alg });
      }
    }
    return { keys };
  }
}

export async function buildSigningKey(config: AuthCoreEnvironment): Promise<SigningKey> {
  const { signingKey } = config;

  if (signingKey.algorithm === 'HS256') {
    const secret = new TextEncoder().encode(signingKey.secret);
    return {
      kid: config.keyId,
      alg: 'HS256',
      signingKey: secret,
      verificationKey: secret,
      jwk: null,
    };
  }

  const privateKey = createPrivateKey({
    key: signingKey.privateKeyPem,
    format: 'pem',
  });
  const publicKey = createPublicKey(privateKey);
  const jwk = await exportJWK(publicKey);

  return {
    kid: config.keyId,
    alg: signingKey.algorithm,
    signingKey: privateKey,
    verificationKey: publicKey,
    jwk,
  };
}

export async function buildVerificationKey(config: VerificationKeyConfig): Promise<SigningKey> {
  const publicKey = createPublicKey({
    key: config.publicKeyPem,
    format: 'pem',
  });
  const jwk = await exportJWK(publicKey);

  return {
    kid: config.kid,
    alg: config.alg,
    signingKey: null,
    verificationKey: publicKey,
    jwk,
  };
}

export async function buildKeyStore(config: AuthCoreEnvironment): Promise<SigningKeyStore> {
  const activeKey = await buildSigningKey(config);
  const verificationKeys = await Promise.all(config.verificationKeys.map(buildVerificationKey));
  return new SigningKeyStore([activeKey, ...verificationKeys], config.keyId);
}

export type SignTokenParams = {
  userId: string;
  tokenUse: TokenUse;
  jti: string;
  issuedAt: Date;
  expiresInSeconds: number;
};

export async function signToken(
  keyStore: SigningKeyStore,
  config: Pick<AuthCoreEnvironment, 'issuer' | 'audience'>,
  params: SignTokenParams
): Promise<{ token: string; claims: TokenClaims }> {
  const key = keyStore.getActiveKey();
  const issuedAt = Math.floor(params.issuedAt.getTime() / 1000);
  const exp = issuedAt + params.expiresInSeconds;

  const payload: JWTPayload = {
    sub: params.userId,
    jti: params.jti,
    token_use: params.tokenUse,
  };

  const token = await new SignJWT(payload)
    .setProtectedHeader({ alg: key.alg, kid: key.kid, typ: 'JWT' })
    .setIssuedAt(issuedAt)
    .setExpirationTime(exp)
    .setIssuer(config.issuer)
    .setAudience(config.audience)
    .sign(key.signingKey);

  return {
    token,
    claims: {
      sub: params.userId,
      jti: params.jti,
      token_use: params.tokenUse,
      iss: config.issuer,
      aud: config.audience,
      iat: issuedAt,
      exp,
    },
  };
}
