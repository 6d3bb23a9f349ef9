import type { UserRole } from '@accounts/types';

export type TokenUse = 'access' | 'refresh';

export type TokenClaims = {
  iss: string;
  aud: string | string[];
  sub: string;
  jti: string;
  token_use: TokenUse;
  iat: number;
  exp: number;
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  accessExpiresAt: Date;
  refreshExpiresAt: Date;
};

export type TokenSubject = {
  id: string;
};

export type RefreshTokenEntry = {
  jti: string;
  userId: string;
  expiresAt: Date;
  createdAt: Date;
  revokedAt: Date | null;
  replacedBy: string | null;
};

export type RegisterRefreshTokenInput = {
  jti: string;
  userId: string;
  expiresAt: Date;
  createdAt: Date;
};

export type RotateRefreshTokenInput = {
  previousJti: string;
  userId: string;
  rotatedAt: Date;
  next: RegisterRefreshTokenInput;
};

/**
 * The identity an access token resolves to, with the account flags
 * the capability table reads.
 */
export type Principal = {
  id: string;
  role: UserRole;
  isActive: boolean;
  isBlocked: boolean;
  isEmailVerified: boolean;
};
