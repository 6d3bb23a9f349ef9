import { randomUUID } from 'node:crypto';
import { type JWTPayload, decodeJwt, errors, jwtVerify } from 'jose';
import { type AuthCoreEnvironment, loadAuthCoreConfig } from './config.js';
import { UnauthorizedError } from './errors.js';
import type { RefreshTokenStore } from './interfaces.js';
import { type SigningKeyStore, buildKeyStore, signToken } from './signing.js';
import type { TokenClaims, TokenPair, TokenSubject, TokenUse } from './types.js';

export const INVALID_REFRESH_TOKEN_MESSAGE = 'Invalid or expired refresh token';

export type TokenServiceConfig = Pick<
  AuthCoreEnvironment,
  | 'issuer'
  | 'audience'
  | 'accessTokenTtlSeconds'
  | 'refreshTokenTtlSeconds'
  | 'rotateRefreshTokens'
  | 'clockToleranceSeconds'
>;

type TokenServiceDependencies = {
  keyStore: SigningKeyStore;
  config: TokenServiceConfig;
  store: RefreshTokenStore;
  /** Whether the account may still hold sessions (active, not blocked, not deleted) */
  isEligible: (userId: string) => Promise<boolean>;
  jtiFactory?: () => string;
  now?: () => Date;
};

export type RevokeOptions = {
  /** Reject tokens that belong to a different user */
  expectedUserId?: string;
};

function isTokenClaims(payload: JWTPayload, use: TokenUse): payload is JWTPayload & TokenClaims {
  return (
    typeof payload.sub === 'string' &&
    payload.sub.length > 0 &&
    typeof payload.jti === 'string' &&
    payload.jti.length > 0 &&
    typeof payload.iat === 'number' &&
    typeof payload.exp === 'number' &&
    payload.token_use === use
  );
}

export class TokenService {
  private readonly keyStore: SigningKeyStore;
  private readonly config: TokenServiceConfig;
  private readonly store: RefreshTokenStore;
  private readonly isEligible: (userId: string) => Promise<boolean>;
  private readonly jtiFactory: () => string;
  private readonly now: () => Date;

  constructor(dependencies: TokenServiceDependencies) {
    this.keyStore = dependencies.keyStore;
    this.config = dependencies.config;
    this.store = dependencies.store;
    this.isEligible = dependencies.isEligible;
    this.jtiFactory = dependencies.jtiFactory ?? randomUUID;
    this.now = dependencies.now ?? (() => new Date());
  }

  get rotationEnabled(): boolean {
    return this.config.rotateRefreshTokens;
  }

  async issue(subject: TokenSubject): Promise<TokenPair> {
    const issuedAt = this.now();
    const access = await this.signAccess(subject.id, issuedAt);
    const refresh = await this.sign(subject.id, 'refresh', issuedAt);

    await this.store.register({
      jti: refresh.claims.jti,
      userId: subject.id,
      expiresAt: toDate(refresh.claims.exp),
      createdAt: issuedAt,
    });

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      accessExpiresAt: toDate(access.claims.exp),
      refreshExpiresAt: toDate(refresh.claims.exp),
    };
  }

  /**
   * Stateless check: signature, expiry and claim shape. No store lookup.
   */
  async verifyAccessToken(token: string): Promise<TokenClaims> {
    try {
      return await this.verify(token, 'access');
    } catch (error) {
      throw new UnauthorizedError('Invalid or expired access token', { cause: error });
    }
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    let claims: TokenClaims;
    try {
      claims = await this.verify(refreshToken, 'refresh');
    } catch (error) {
      throw invalidRefreshToken(error);
    }

    const entry = await this.store.find(claims.jti);
    if (!entry || entry.revokedAt || entry.userId !== claims.sub) {
      throw invalidRefreshToken();
    }

    if (!(await this.isEligible(claims.sub))) {
      throw invalidRefreshToken();
    }

    const issuedAt = this.now();
    const access = await this.signAccess(claims.sub, issuedAt);

    if (!this.config.rotateRefreshTokens) {
      return {
        accessToken: access.token,
        refreshToken,
        accessExpiresAt: toDate(access.claims.exp),
        refreshExpiresAt: toDate(claims.exp),
      };
    }

    const next = await this.sign(claims.sub, 'refresh', issuedAt);
    const rotated = await this.store.rotate({
      previousJti: claims.jti,
      userId: claims.sub,
      rotatedAt: issuedAt,
      next: {
        jti: next.claims.jti,
        userId: claims.sub,
        expiresAt: toDate(next.claims.exp),
        createdAt: issuedAt,
      },
    });

    // Lost a race with a concurrent rotation or revocation of the same token
    if (!rotated) {
      throw invalidRefreshToken();
    }

    return {
      accessToken: access.token,
      refreshToken: next.token,
      accessExpiresAt: toDate(access.claims.exp),
      refreshExpiresAt: toDate(next.claims.exp),
    };
  }

  /**
   * Idempotent. Expired tokens are a no-op; forged or foreign tokens are rejected.
   */
  async revoke(refreshToken: string, options: RevokeOptions = {}): Promise<void> {
    let claims: TokenClaims;
    try {
      claims = await this.verify(refreshToken, 'refresh');
    } catch (error) {
      // jose checks the signature before the claims, so an expired token is genuine
      if (error instanceof errors.JWTExpired) {
        this.assertOwner(decodeJwt(refreshToken).sub, options);
        return;
      }
      throw invalidRefreshToken(error);
    }

    this.assertOwner(claims.sub, options);
    await this.store.add(claims.jti, this.now());
  }

  async revokeAll(userId: string): Promise<number> {
    return this.store.addAll(userId, this.now());
  }

  async purgeExpired(): Promise<number> {
    return this.store.purgeExpired(this.now());
  }

  private assertOwner(subject: string | undefined, options: RevokeOptions): void {
    if (options.expectedUserId && subject !== options.expectedUserId) {
      throw invalidRefreshToken();
    }
  }

  private signAccess(userId: string, issuedAt: Date) {
    return this.sign(userId, 'access', issuedAt);
  }

  private sign(userId: string, tokenUse: TokenUse, issuedAt: Date) {
    return signToken(this.keyStore, this.config, {
      userId,
      tokenUse,
      jti: this.jtiFactory(),
      issuedAt,
      expiresInSeconds:
        tokenUse === 'access' ? this.config.accessTokenTtlSeconds : this.config.refreshTokenTtlSeconds,
    });
  }

  private async verify(token: string, use: TokenUse): Promise<TokenClaims> {
    const { payload } = await jwtVerify(
      token,
      async ({ kid }: { kid?: string }) => {
        return this.keyStore.getVerificationKey(kid).verificationKey;
      },
      {
        issuer: this.config.issuer,
        audience: this.config.audience,
        algorithms: this.keyStore.getAlgorithms(),
        clockTolerance: this.config.clockToleranceSeconds,
        currentDate: this.now(),
      }
    );

    if (!isTokenClaims(payload, use)) {
      throw new Error(`Token is not a valid ${use} token`);
    }

    return {
      iss: this.config.issuer,
      aud: this.config.audience,
      sub: payload.sub,
      jti: payload.jti,
      token_use: use,
      iat: payload.iat,
      exp: payload.exp,
    };
  }
}

function toDate(epochSeconds: number): Date {
  return new Date(epochSeconds * 1000);
}

function invalidRefreshToken(cause?: unknown): UnauthorizedError {
  return new UnauthorizedError(
    INVALID_REFRESH_TOKEN_MESSAGE,
    cause === undefined ? undefined : { cause }
  );
}

export type CreateTokenServiceOptions = Omit<TokenServiceDependencies, 'keyStore' | 'config'> & {
  config?: AuthCoreEnvironment;
  keyStore?: SigningKeyStore;
};

export async function createTokenService(
  options: CreateTokenServiceOptions
): Promise<{ tokenService: TokenService; keyStore: SigningKeyStore; config: AuthCoreEnvironment }> {
  const { config: providedConfig, keyStore: providedKeyStore, ...dependencies } = options;
  const config = providedConfig ?? loadAuthCoreConfig();
  const keyStore = providedKeyStore ?? (await buildKeyStore(config));

  return {
    tokenService: new TokenService({ ...dependencies, keyStore, config }),
    keyStore,
    config,
  };
}
