/**
 * Authentication event emitter for audit logging and monitoring
 * Events are fire-and-forget to avoid blocking the authentication flow
 */

import { logger as defaultLogger, type Logger } from '@accounts/observability';

export type AuthEventType =
  | 'user.registered'
  | 'user.login.success'
  | 'user.login.failed'
  | 'user.logout'
  | 'user.logout_all'
  | 'user.password_changed'
  | 'user.profile_updated'
  | 'user.status_changed'
  | 'user.deleted'
  | 'token.refreshed'
  | 'token.refresh_failed'
  | 'token.revoked_all'
  | 'password_reset.requested'
  | 'password_reset.completed'
  | 'email_verification.requested'
  | 'email.verified'
  | 'notification.failed'
  | 'auth.rate_limited';

/**
 * Base authentication event structure
 */
export interface AuthEvent {
  type: AuthEventType;
  userId?: string;
  email?: string;
  ip?: string;
  requestId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export type AuthEventInput = Omit<AuthEvent, 'timestamp'>;

export type AuthEventHandler = (event: AuthEvent) => void | Promise<void>;

export interface AuthEventSink {
  emit(event: AuthEventInput): void;
}

export class AuthEventEmitter implements AuthEventSink {
  private handlers: AuthEventHandler[] = [];

  constructor(private logger: Logger = defaultLogger) {}

  on(handler: AuthEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((existing) => existing !== handler);
    };
  }

  /**
   * Deliver to every handler without waiting; a failing handler is logged
   * and does not stop the others.
   */
  emit(event: AuthEventInput): void {
    const fullEvent: AuthEvent = {
      ...event,
      timestamp: new Date(),
    };

    for (const handler of this.handlers) {
      void Promise.resolve()
        .then(() => handler(fullEvent))
        .catch((error: unknown) => {
          this.logger.error({ err: error, event: fullEvent.type }, 'Auth event handler error');
        });
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers(): void {
    this.handlers = [];
  }

  get handlerCount(): number {
    return this.handlers.length;
  }
}
