import type { TokenService } from '@accounts/auth-core';
import { logger as defaultLogger, type Logger } from '@accounts/observability';
import type { VerificationService } from '../verification/verification-service.js';

export type PurgeResult = {
  refreshTokens: number;
  actionTokens: number;
};

/**
 * Delete expired refresh tokens and expired or consumed action tokens
 */
export async function purgeExpiredCredentials(
  services: { tokens: TokenService; verification: VerificationService },
  logger: Logger = defaultLogger
): Promise<PurgeResult> {
  const result: PurgeResult = {
    refreshTokens: await services.tokens.purgeExpired(),
    actionTokens: await services.verification.purgeExpired(),
  };

  if (result.refreshTokens > 0 || result.actionTokens > 0) {
    logger.info(result, 'Purged expired credentials');
  }
  return result;
}
