/**
 * Account Service
 *
 * Orchestrates the credential lifecycle: registration, login, token
 * refresh/revocation, password change and reset, email verification,
 * profile edits and administrative status changes. Stateless per call;
 * everything is rebuilt from the presented token and the stores.
 */

import {
  type AuthEventSink,
  type NotificationDispatcher,
  getDummyPasswordHash,
  hashPassword,
  validatePasswordStrength,
  verifyPassword,
} from '@accounts/auth';
import {
  type Principal,
  RateLimitedError,
  type TokenPair,
  type TokenService,
  UnauthorizedError,
  ValidationError,
  type ValidationIssue,
  NotFoundError,
  authz,
} from '@accounts/auth-core';
import { logger as defaultLogger, type Logger } from '@accounts/observability';
import type { RateLimiter } from '@accounts/rate-limit';
import type {
  AdminUserUpdateInput,
  EmailVerificationConfirmInput,
  LoginInput,
  PasswordChangeInput,
  PasswordResetConfirmInput,
  ProfileUpdateInput,
  RegisterInput,
  UserListQuery,
  UserResponse,
} from '@accounts/types';
import { toPrincipal, toUserResponse, toUserSummary } from '../users/user-mapper.js';
import { diffUserStatus, isSessionEligible, requiresSessionRevocation } from '../users/user-status.js';
import type { CredentialStore, UpdateUserData, User, UserStatusPatch } from '../users/user-types.js';
import type { VerificationService } from '../verification/verification-service.js';
import type {
  AccountServiceConfig,
  IssuedSession,
  LoginResult,
  RequestContext,
  UserListResult,
} from './account-types.js';

export const INVALID_CREDENTIALS_MESSAGE = 'Invalid email or password';

type AccountServiceDependencies = {
  users: CredentialStore;
  tokens: TokenService;
  verification: VerificationService;
  loginLimiter: RateLimiter;
  recoveryLimiter: RateLimiter;
  notifications: NotificationDispatcher;
  events: AuthEventSink;
  config: AccountServiceConfig;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

function toSession(pair: TokenPair): IssuedSession {
  return {
    access: pair.accessToken,
    refresh: pair.refreshToken,
    accessExpiresAt: pair.accessExpiresAt,
    refreshExpiresAt: pair.refreshExpiresAt,
  };
}

function passwordIssues(field: string, issues: string[]): ValidationError {
  return new ValidationError(
    'Password does not meet requirements',
    issues.map((message) => ({ field, message }))
  );
}

function passwordMismatch(field: string): ValidationError {
  return new ValidationError('Passwords do not match', [{ field, message: 'Passwords do not match' }]);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class AccountService {
  private readonly users: CredentialStore;
  private readonly tokens: TokenService;
  private readonly verification: VerificationService;
  private readonly loginLimiter: RateLimiter;
  private readonly recoveryLimiter: RateLimiter;
  private readonly notifications: NotificationDispatcher;
  private readonly events: AuthEventSink;
  private readonly config: AccountServiceConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(dependencies: AccountServiceDependencies) {
    this.users = dependencies.users;
    this.tokens = dependencies.tokens;
    this.verification = dependencies.verification;
    this.loginLimiter = dependencies.loginLimiter;
    this.recoveryLimiter = dependencies.recoveryLimiter;
    this.notifications = dependencies.notifications;
    this.events = dependencies.events;
    this.config = dependencies.config;
    this.logger = dependencies.logger ?? defaultLogger;
    this.now = dependencies.now ?? (() => new Date());
    this.sleep = dependencies.sleep ?? defaultSleep;
  }

  /**
   * Register a new account
   *
   * Business rules:
   * - Password confirmation must match and the password policy must pass
   * - New accounts are always role=user, active, unblocked and unverified
   * - No session is issued; the client logs in afterwards
   * - Welcome and verification emails are best-effort
   */
  async register(input: RegisterInput, context: RequestContext = {}): Promise<UserResponse> {
    if (input.password !== input.password_confirm) {
      throw passwordMismatch('password_confirm');
    }

    const issues = validatePasswordStrength(input.password, {
      email: input.email,
      username: input.username,
    });
    if (issues.length > 0) {
      throw passwordIssues('password', issues);
    }

    const user = await this.users.create({
      email: input.email,
      username: input.username,
      passwordHash: await hashPassword(input.password),
      role: 'user',
      profile: {
        recoveryEmail: input.recovery_email,
        phoneNumber: input.phone_number,
        address: input.address,
        country: input.country,
      },
    });

    this.events.emit({
      type: 'user.registered',
      userId: user.id,
      email: user.email,
      ...context,
    });

    this.notifications.dispatch('welcome', user.email, (notifier) =>
      notifier.sendWelcomeEmail({ to: user.email, username: user.username })
    );
    await this.sendVerificationEmail(user, context);

    return toUserResponse(user);
  }

  /**
   * Every credential failure is the same UnauthorizedError; unknown emails
   * still pay for a password verification.
   */
  async login(input: LoginInput, context: RequestContext = {}): Promise<LoginResult> {
    const limit = await this.loginLimiter.checkLimit(`login:${input.email}`);
    if (!limit.allowed) {
      this.events.emit({ type: 'auth.rate_limited', email: input.email, ...context, metadata: { scope: 'login' } });
      throw new RateLimitedError(this.retryAfterSeconds(limit.reset));
    }

    const user = await this.users.findByEmail(input.email);
    const passwordValid = user
      ? await this.users.verifySecret(user, input.password)
      : await verifyPassword(input.password, await getDummyPasswordHash()).then(() => false);

    if (!user || !passwordValid || !isSessionEligible(user)) {
      this.events.emit({
        type: 'user.login.failed',
        email: input.email,
        ...context,
        metadata: { reason: !user ? 'unknown_email' : !passwordValid ? 'invalid_password' : 'ineligible' },
      });
      throw new UnauthorizedError(INVALID_CREDENTIALS_MESSAGE);
    }

    const pair = await this.tokens.issue(user);
    const loggedInAt = this.now();
    await this.users.recordLogin(user.id, loggedInAt);

    this.events.emit({ type: 'user.login.success', userId: user.id, email: user.email, ...context });

    return {
      user: toUserResponse({ ...user, lastLoginAt: loggedInAt }),
      ...toSession(pair),
    };
  }

  async refresh(refreshToken: string, context: RequestContext = {}): Promise<IssuedSession> {
    try {
      const pair = await this.tokens.refresh(refreshToken);
      this.events.emit({
        type: 'token.refreshed',
        ...context,
        metadata: { rotated: this.tokens.rotationEnabled },
      });
      return toSession(pair);
    } catch (error) {
      this.events.emit({ type: 'token.refresh_failed', ...context });
      throw error;
    }
  }

  /**
   * Revoke the presented refresh token; it must belong to the caller
   */
  async logout(principal: Principal, refreshToken: string, context: RequestContext = {}): Promise<void> {
    await this.tokens.revoke(refreshToken, { expectedUserId: principal.id });
    this.events.emit({ type: 'user.logout', userId: principal.id, ...context });
  }

  async logoutEverywhere(principal: Principal, context: RequestContext = {}): Promise<number> {
    const revoked = await this.tokens.revokeAll(principal.id);
    this.events.emit({
      type: 'user.logout_all',
      userId: principal.id,
      ...context,
      metadata: { revoked },
    });
    return revoked;
  }

  async changePassword(
    principal: Principal,
    input: PasswordChangeInput,
    context: RequestContext = {}
  ): Promise<void> {
    const user = await this.users.findById(principal.id);
    if (!user) {
      throw new UnauthorizedError('User not found');
    }

    if (!(await this.users.verifySecret(user, input.old_password))) {
      throw new ValidationError('Current password is incorrect', [
        { field: 'old_password', message: 'Current password is incorrect' },
      ]);
    }
    if (input.new_password !== input.new_password_confirm) {
      throw passwordMismatch('new_password_confirm');
    }
    const issues = validatePasswordStrength(input.new_password, {
      email: user.email,
      username: user.username,
    });
    if (issues.length > 0) {
      throw passwordIssues('new_password', issues);
    }

    await this.users.update(user.id, { passwordHash: await hashPassword(input.new_password) });
    const revoked = await this.tokens.revokeAll(user.id);

    this.events.emit({ type: 'user.password_changed', userId: user.id, ...context });
    this.emitRevokedAll(user.id, revoked, 'password_changed', context);
  }

  /**
   * Same response whether or not the account exists; over-limit requests are dropped silently.
   */
  async requestPasswordReset(email: string, context: RequestContext = {}): Promise<void> {
    await this.withEnumerationFloor(async () => {
      if (!(await this.admitRecovery('password_reset', email, context))) {
        return;
      }

      const user = await this.users.findByEmail(email);
      if (!user || !isSessionEligible(user)) {
        this.verification.issueDecoyToken('password_reset');
        return;
      }

      const { token } = await this.verification.issueResetToken(user);
      const resetUrl = this.buildLink('/reset-password', { token, user_id: user.id });
      this.notifications.dispatch('password_reset', user.email, (notifier) =>
        notifier.sendPasswordResetEmail({
          to: user.email,
          resetUrl,
          expiresInMinutes: this.verification.resetTtlMinutes,
        })
      );

      this.events.emit({ type: 'password_reset.requested', userId: user.id, email: user.email, ...context });
    });
  }

  async confirmPasswordReset(input: PasswordResetConfirmInput, context: RequestContext = {}): Promise<void> {
    await this.withEnumerationFloor(async () => {
      if (input.new_password !== input.new_password_confirm) {
        throw passwordMismatch('new_password_confirm');
      }

      const ownerId = await this.verification.inspectResetToken(input.token, input.user_id);
      const owner = await this.users.findById(ownerId);
      const issues = validatePasswordStrength(input.new_password, {
        email: owner?.email,
        username: owner?.username,
      });
      if (issues.length > 0) {
        throw passwordIssues('new_password', issues);
      }

      const user = await this.verification.redeemResetToken(
        input.token,
        input.user_id,
        await hashPassword(input.new_password)
      );
      const revoked = await this.tokens.revokeAll(user.id);

      this.events.emit({ type: 'password_reset.completed', userId: user.id, ...context });
      this.emitRevokedAll(user.id, revoked, 'password_reset', context);
    });
  }

  async requestEmailVerification(email: string, context: RequestContext = {}): Promise<void> {
    await this.withEnumerationFloor(async () => {
      if (!(await this.admitRecovery('email_verification', email, context))) {
        return;
      }

      const user = await this.users.findByEmail(email);
      if (!user || user.isEmailVerified) {
        this.verification.issueDecoyToken('email_verification');
        return;
      }

      await this.sendVerificationEmail(user, context);
    });
  }

  async confirmEmailVerification(
    input: EmailVerificationConfirmInput,
    context: RequestContext = {}
  ): Promise<UserResponse> {
    const user = await this.verification.redeemVerificationToken(input.token);
    this.events.emit({ type: 'email.verified', userId: user.id, email: user.email, ...context });
    return toUserResponse(user);
  }

  /**
   * Access token → principal with the account's current flags
   */
  async resolvePrincipal(accessToken: string): Promise<Principal> {
    const claims = await this.tokens.verifyAccessToken(accessToken);
    const user = await this.users.findById(claims.sub);
    if (!user) {
      throw new UnauthorizedError('User not found');
    }
    return toPrincipal(user);
  }

  async getProfile(principal: Principal): Promise<UserResponse> {
    return toUserResponse(await this.requireUser(principal.id));
  }

  async updateProfile(
    principal: Principal,
    input: ProfileUpdateInput,
    context: RequestContext = {}
  ): Promise<UserResponse> {
    const patch: UpdateUserData = {
      ...(input.username !== undefined && { username: input.username }),
      ...(input.recovery_email !== undefined && { recoveryEmail: input.recovery_email }),
      ...(input.phone_number !== undefined && { phoneNumber: input.phone_number }),
      ...(input.address !== undefined && { address: input.address }),
      ...(input.country !== undefined && { country: input.country }),
      ...(input.bio !== undefined && { bio: input.bio }),
    };

    const fields = Object.keys(patch);
    if (fields.length === 0) {
      return this.getProfile(principal);
    }

    const user = await this.users.update(principal.id, patch);
    this.events.emit({
      type: 'user.profile_updated',
      userId: user.id,
      ...context,
      metadata: { fields },
    });
    return toUserResponse(user);
  }

  async listUsers(actor: Principal | null, query: UserListQuery): Promise<UserListResult> {
    authz.require(actor, ['admin']);
    const [users, total] = await Promise.all([this.users.list(query), this.users.count()]);
    return {
      users: users.map(toUserSummary),
      total,
      limit: query.limit,
      offset: query.offset,
    };
  }

  async getUser(actor: Principal | null, userId: string): Promise<UserResponse> {
    authz.require(actor, ['admin']);
    return toUserResponse(await this.requireUser(userId));
  }

  /**
   * Change role and status flags of another account.
   *
   * Admins cannot demote, block or deactivate themselves. Blocking or
   * deactivating revokes every refresh token of the target.
   */
  async adminUpdate(
    actor: Principal | null,
    targetId: string,
    input: AdminUserUpdateInput,
    context: RequestContext = {}
  ): Promise<UserResponse> {
    authz.require(actor, ['admin']);

    if (actor.id === targetId) {
      const issues: ValidationIssue[] = [];
      if (input.role !== undefined && input.role !== actor.role) {
        issues.push({ field: 'role', message: 'You cannot change your own role' });
      }
      if (input.is_blocked === true) {
        issues.push({ field: 'is_blocked', message: 'You cannot block yourself' });
      }
      if (input.is_active === false) {
        issues.push({ field: 'is_active', message: 'You cannot deactivate yourself' });
      }
      if (issues.length > 0) {
        throw new ValidationError('Administrators cannot restrict their own account', issues);
      }
    }

    const patch: UserStatusPatch = {
      ...(input.role !== undefined && { role: input.role }),
      ...(input.is_active !== undefined && { isActive: input.is_active }),
      ...(input.is_blocked !== undefined && { isBlocked: input.is_blocked }),
    };

    const { before, after } = await this.users.updateStatus(targetId, patch);
    const transitions = diffUserStatus(before, after);

    if (transitions.length > 0) {
      this.events.emit({
        type: 'user.status_changed',
        userId: after.id,
        ...context,
        metadata: { changedBy: actor.id, transitions },
      });
    }

    if (requiresSessionRevocation(transitions)) {
      const revoked = await this.tokens.revokeAll(after.id);
      this.emitRevokedAll(after.id, revoked, 'status_changed', context);
    }

    return toUserResponse(after);
  }

  async adminDelete(actor: Principal | null, targetId: string, context: RequestContext = {}): Promise<void> {
    authz.require(actor, ['admin']);

    if (actor.id === targetId) {
      throw new ValidationError('You cannot delete your own account', [
        { field: 'id', message: 'You cannot delete your own account' },
      ]);
    }

    const user = await this.users.softDelete(targetId);
    const revoked = await this.tokens.revokeAll(user.id);

    this.events.emit({ type: 'user.deleted', userId: user.id, ...context, metadata: { deletedBy: actor.id } });
    this.emitRevokedAll(user.id, revoked, 'deleted', context);
  }

  private async requireUser(userId: string): Promise<User> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }

  private async sendVerificationEmail(user: User, context: RequestContext): Promise<void> {
    try {
      const { token } = await this.verification.issueVerificationToken(user);
      const verificationUrl = this.buildLink('/verify-email', { token });
      this.notifications.dispatch('email_verification', user.email, (notifier) =>
        notifier.sendVerificationEmail({
          to: user.email,
          verificationUrl,
          expiresInHours: this.verification.verificationTtlHours,
        })
      );
      this.events.emit({
        type: 'email_verification.requested',
        userId: user.id,
        email: user.email,
        ...context,
      });
    } catch (error) {
      // Registration has already committed; the user can ask for a new link
      this.logger.error({ err: error, userId: user.id }, 'Failed to issue email verification token');
    }
  }

  private async admitRecovery(
    purpose: 'password_reset' | 'email_verification',
    email: string,
    context: RequestContext
  ): Promise<boolean> {
    const allowed = await this.recoveryLimiter.admit(`${purpose}:${email.toLowerCase().trim()}`);
    if (!allowed) {
      this.events.emit({ type: 'auth.rate_limited', email, ...context, metadata: { scope: purpose } });
    }
    return allowed;
  }

  private async withEnumerationFloor(operation: () => Promise<void>): Promise<void> {
    const startedAt = Date.now();
    try {
      await operation();
    } finally {
      const remaining = this.config.enumerationFloorMs - (Date.now() - startedAt);
      if (remaining > 0) {
        await this.sleep(remaining);
      }
    }
  }

  private buildLink(path: string, params: Record<string, string>): string {
    const url = new URL(path, this.config.appUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private retryAfterSeconds(resetEpochSeconds: number): number {
    return Math.max(1, resetEpochSeconds - Math.floor(this.now().getTime() / 1000));
  }

  private emitRevokedAll(userId: string, revoked: number, reason: string, context: RequestContext): void {
    this.events.emit({ type: 'token.revoked_all', userId, ...context, metadata: { revoked, reason } });
  }
}
