export type AuthErrorKind =
  | 'validation_error'
  | 'duplicate_resource'
  | 'invalid_or_expired'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'rate_limited'
  | 'dependency_unavailable'
  | 'internal_error';

export type AuthErrorStatus = 400 | 401 | 403 | 404 | 429 | 500 | 503;

export type ValidationIssue = {
  field?: string;
  message: string;
};

export class AuthCoreError extends Error {
  readonly kind: AuthErrorKind = 'internal_error';
  readonly status: AuthErrorStatus = 500;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AuthCoreError {
  override readonly kind = 'validation_error';
  override readonly status = 400;

  constructor(
    message = 'Invalid input',
    readonly issues: ValidationIssue[] = [],
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export type DuplicateField = 'email' | 'username';

export class DuplicateResourceError extends AuthCoreError {
  override readonly kind = 'duplicate_resource';
  override readonly status = 400;

  constructor(
    readonly field: DuplicateField,
    options?: ErrorOptions
  ) {
    super(`A user with that ${field} already exists`, options);
  }
}

/**
 * Single failure for every rejected action token, whatever the reason.
 */
export class InvalidOrExpiredTokenError extends AuthCoreError {
  override readonly kind = 'invalid_or_expired';
  override readonly status = 400;

  constructor(message = 'Token is invalid or expired', options?: ErrorOptions) {
    super(message, options);
  }
}

export class UnauthorizedError extends AuthCoreError {
  override readonly kind = 'unauthorized';
  override readonly status = 401;

  constructor(message = 'Unauthorized', options?: ErrorOptions) {
    super(message, options);
  }
}

export class AuthorizationError extends AuthCoreError {
  override readonly kind = 'forbidden';
  override readonly status = 403;

  constructor(message = 'Forbidden', options?: ErrorOptions) {
    super(message, options);
  }
}

export class NotFoundError extends AuthCoreError {
  override readonly kind = 'not_found';
  override readonly status = 404;

  constructor(message = 'Not found', options?: ErrorOptions) {
    super(message, options);
  }
}

export class RateLimitedError extends AuthCoreError {
  override readonly kind = 'rate_limited';
  override readonly status = 429;

  constructor(
    readonly retryAfterSeconds: number,
    message = 'Too many requests. Please try again later.',
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class TransientDependencyError extends AuthCoreError {
  override readonly kind = 'dependency_unavailable';
  override readonly status = 503;

  constructor(message = 'Service temporarily unavailable', options?: ErrorOptions) {
    super(message, options);
  }
}

export function isAuthCoreError(error: unknown): error is AuthCoreError {
  return error instanceof AuthCoreError;
}
