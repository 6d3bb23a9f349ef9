/**
 * @accounts/observability
 *
 * Structured logging with Pino and the redaction rules every service log goes through.
 */

export { createLogger, logger, redactTokens, redactObjectTokens } from './logger.js';
export type { Logger } from './logger.js';
