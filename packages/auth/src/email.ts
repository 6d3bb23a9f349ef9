import { createHash } from 'node:crypto';
import { Resend } from 'resend';
import { logger as defaultLogger, type Logger } from '@accounts/observability';
import type { AuthEventSink } from './events.js';

export interface SendWelcomeEmailParams {
  to: string;
  username: string;
}

export interface SendPasswordResetEmailParams {
  to: string;
  resetUrl: string;
  expiresInMinutes: number;
}

export interface SendVerificationEmailParams {
  to: string;
  verificationUrl: string;
  expiresInHours: number;
}

/**
 * Outbound account email. Implementations throw on delivery failure.
 */
export interface AccountNotifier {
  sendWelcomeEmail(params: SendWelcomeEmailParams): Promise<void>;
  sendPasswordResetEmail(params: SendPasswordResetEmailParams): Promise<void>;
  sendVerificationEmail(params: SendVerificationEmailParams): Promise<void>;
}

export type RenderedEmail = {
  subject: string;
  html: string;
  text: string;
};

export function getRecipientLogId(email: string): string {
  return createHash('sha256').update(email.trim().toLowerCase()).digest('hex').slice(0, 12);
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
  </head>
  <body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;">
    <h1 style="color: #2563eb; margin-bottom: 24px;">${escapeHtml(title)}</h1>
    ${body}
    <hr style="border: none; border-top: 1px solid #e5e7eb; margin: 32px 0;">
    <p style="color: #666; font-size: 14px;">If you didn't request this email, you can safely ignore it.</p>
  </body>
</html>`;
}

function actionButton(url: string, label: string): string {
  const href = escapeHtml(url);
  return `<a href="${href}" style="display: inline-block; background-color: #2563eb; color: white; padding: 12px 24px; text-decoration: none; border-radius: 6px; font-weight: 600; margin-bottom: 24px;">${escapeHtml(label)}</a>
    <p style="margin-bottom: 16px; color: #666; font-size: 14px;">Or copy and paste this link into your browser:</p>
    <p style="margin-bottom: 24px; word-break: break-all; color: #2563eb; font-size: 14px;">${href}</p>`;
}

export function renderWelcomeEmail(appName: string, params: SendWelcomeEmailParams): RenderedEmail {
  return {
    subject: `Welcome to ${appName}`,
    html: layout(
      `Welcome, ${params.username}!`,
      `<p style="margin-bottom: 24px;">Your ${escapeHtml(appName)} account has been created. Check your inbox for a link to verify your email address.</p>`
    ),
    text: `Welcome to ${appName}, ${params.username}!\n\nYour account has been created. Check your inbox for a link to verify your email address.`,
  };
}

export function renderPasswordResetEmail(
  appName: string,
  params: SendPasswordResetEmailParams
): RenderedEmail {
  return {
    subject: `Reset your ${appName} password`,
    html: layout(
      'Reset your password',
      `<p style="margin-bottom: 24px;">We received a request to reset your password. The link expires in ${params.expiresInMinutes} minutes.</p>
    ${actionButton(params.resetUrl, 'Choose a new password')}`
    ),
    text: `Reset your ${appName} password\n\nOpen the link below to choose a new password:\n\n${params.resetUrl}\n\nThis link will expire in ${params.expiresInMinutes} minutes.`,
  };
}

export function renderVerificationEmail(
  appName: string,
  params: SendVerificationEmailParams
): RenderedEmail {
  return {
    subject: `Verify your email address - ${appName}`,
    html: layout(
      'Verify your email address',
      `<p style="margin-bottom: 24px;">Confirm this address to finish setting up your account. The link expires in ${params.expiresInHours} hours.</p>
    ${actionButton(params.verificationUrl, 'Verify email')}`
    ),
    text: `Verify your email address\n\nOpen the link below to verify your email:\n\n${params.verificationUrl}\n\nThis link will expire in ${params.expiresInHours} hours.`,
  };
}

export type ResendNotifierOptions = {
  apiKey: string;
  from: string;
  appName: string;
  logger?: Logger;
  client?: Resend;
};

export class ResendNotifier implements AccountNotifier {
  private readonly resend: Resend;
  private readonly logger: Logger;

  constructor(private options: ResendNotifierOptions) {
    this.resend = options.client ?? new Resend(options.apiKey);
    this.logger = options.logger ?? defaultLogger;
  }

  sendWelcomeEmail(params: SendWelcomeEmailParams): Promise<void> {
    return this.send('welcome', params.to, renderWelcomeEmail(this.options.appName, params));
  }

  sendPasswordResetEmail(params: SendPasswordResetEmailParams): Promise<void> {
    return this.send('password_reset', params.to, renderPasswordResetEmail(this.options.appName, params));
  }

  sendVerificationEmail(params: SendVerificationEmailParams): Promise<void> {
    return this.send('email_verification', params.to, renderVerificationEmail(this.options.appName, params));
  }

  private async send(kind: string, to: string, email: RenderedEmail): Promise<void> {
    const recipient = getRecipientLogId(to);
    this.logger.debug({ kind, recipient, from: this.options.from }, 'Sending account email');

    const result = await this.resend.emails.send({
      from: this.options.from,
      to,
      subject: email.subject,
      html: email.html,
      text: email.text,
    });

    if (result.error) {
      throw new Error(`Failed to send email: ${result.error.message}`);
    }

    this.logger.info({ kind, recipient, emailId: result.data?.id }, 'Account email sent');
  }
}

/**
 * Development notifier: logs that an email would have been sent.
 * Links pass through the logger's token masking.
 */
export class LogNotifier implements AccountNotifier {
  constructor(private logger: Logger = defaultLogger) {}

  async sendWelcomeEmail(params: SendWelcomeEmailParams): Promise<void> {
    this.logger.info({ kind: 'welcome', recipient: getRecipientLogId(params.to) }, 'Email delivery disabled');
  }

  async sendPasswordResetEmail(params: SendPasswordResetEmailParams): Promise<void> {
    this.logger.info(
      { kind: 'password_reset', recipient: getRecipientLogId(params.to), url: params.resetUrl },
      'Email delivery disabled'
    );
  }

  async sendVerificationEmail(params: SendVerificationEmailParams): Promise<void> {
    this.logger.info(
      { kind: 'email_verification', recipient: getRecipientLogId(params.to), url: params.verificationUrl },
      'Email delivery disabled'
    );
  }
}

export type NotificationKind = 'welcome' | 'password_reset' | 'email_verification';

export type NotificationDispatcherOptions = {
  timeoutMs: number;
  logger?: Logger;
  events?: AuthEventSink;
};

/**
 * Runs notifier calls off the request path with a timeout.
 * Failures are logged (and emitted as `notification.failed`), never thrown.
 */
export class NotificationDispatcher {
  private readonly pending = new Set<Promise<boolean>>();
  private readonly logger: Logger;

  constructor(
    private notifier: AccountNotifier,
    private options: NotificationDispatcherOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  dispatch(
    kind: NotificationKind,
    recipient: string,
    send: (notifier: AccountNotifier) => Promise<void>
  ): void {
    const task = this.run(kind, recipient, send);
    this.pending.add(task);
    void task.finally(() => {
      this.pending.delete(task);
    });
  }

  /**
   * Wait for in-flight notifications (shutdown and tests)
   */
  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private async run(
    kind: NotificationKind,
    recipient: string,
    send: (notifier: AccountNotifier) => Promise<void>
  ): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Notification timed out after ${this.options.timeoutMs}ms`)),
        this.options.timeoutMs
      );
    });

    try {
      await Promise.race([Promise.resolve().then(() => send(this.notifier)), timeout]);
      return true;
    } catch (error) {
      const recipientId = getRecipientLogId(recipient);
      this.logger.error({ err: error, kind, recipient: recipientId }, 'Account email failed');
      this.options.events?.emit({
        type: 'notification.failed',
        metadata: { kind, recipient: recipientId },
      });
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}
