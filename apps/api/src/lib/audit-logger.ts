import {
  getRecipientLogId,
  type AuthEvent,
  type AuthEventEmitter,
  type AuthEventType,
} from '@accounts/auth';
import type { Logger } from '@accounts/observability';

type AuditLevel = 'info' | 'warn' | 'error';

const AUDIT_MESSAGES = {
  'user.registered': { level: 'info', message: 'User registered successfully' },
  'user.login.success': { level: 'info', message: 'User login successful' },
  'user.login.failed': { level: 'warn', message: 'User login failed' },
  'user.logout': { level: 'info', message: 'User logged out' },
  'user.logout_all': { level: 'info', message: 'User logged out of all sessions' },
  'user.password_changed': { level: 'info', message: 'User password changed' },
  'user.profile_updated': { level: 'info', message: 'User profile updated' },
  'user.status_changed': { level: 'info', message: 'User account status changed' },
  'user.deleted': { level: 'info', message: 'User account deleted' },
  'token.refreshed': { level: 'info', message: 'Refresh token rotated' },
  'token.refresh_failed': { level: 'warn', message: 'Refresh token rejected' },
  'token.revoked_all': { level: 'info', message: 'All refresh tokens revoked' },
  'password_reset.requested': { level: 'info', message: 'Password reset requested' },
  'password_reset.completed': { level: 'info', message: 'Password reset completed' },
  'email_verification.requested': { level: 'info', message: 'Email verification requested' },
  'email.verified': { level: 'info', message: 'Email address verified' },
  'notification.failed': { level: 'error', message: 'Account email delivery failed' },
  'auth.rate_limited': { level: 'warn', message: 'Authentication attempt rate limited' },
} as const satisfies Record<AuthEventType, { level: AuditLevel; message: string }>;

const SUCCESS_EVENTS = new Set<AuthEventType>([
  'user.registered',
  'user.login.success',
  'password_reset.completed',
  'email.verified',
]);

export function buildAuditEntry(event: AuthEvent) {
  const { type, userId, email, ip, requestId, timestamp, metadata } = event;

  return {
    event: type,
    userId: userId ?? 'unknown',
    recipient: email ? getRecipientLogId(email) : 'unknown',
    ip: ip ?? 'unknown',
    timestamp: timestamp.toISOString(),
    success: SUCCESS_EVENTS.has(type),
    ...(requestId !== undefined && { requestId }),
    ...(metadata !== undefined && { metadata }),
  };
}

/**
 * Subscribe a structured log line to every authentication event.
 * Addresses are logged as a short hash; the logger redacts token fields.
 *
 * @returns unsubscribe function
 */
export function initializeAuditLogging(events: AuthEventEmitter, logger: Logger): () => void {
  const unsubscribe = events.on((event) => {
    const { level, message } = AUDIT_MESSAGES[event.type];
    logger[level](buildAuditEntry(event), message);
  });

  logger.info('Audit logging initialized for authentication events');
  return unsubscribe;
}
