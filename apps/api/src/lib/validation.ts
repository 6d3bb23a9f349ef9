import type { Context } from 'hono';
import type { ZodError } from 'zod';
import { ValidationError } from '@accounts/auth-core';
import type { RequestContext } from '@accounts/core';
import type { AppBindings } from '../types/context.js';

type ValidationResult = { success: true } | { success: false; error: ZodError };

export function toValidationError(error: ZodError): ValidationError {
  return new ValidationError(
    'Invalid input',
    error.issues.map((issue) => ({
      ...(issue.path.length > 0 && { field: issue.path.join('.') }),
      message: issue.message,
    }))
  );
}

/**
 * zValidator hook: invalid input becomes a ValidationError for the error handler
 */
export function rejectInvalid(result: ValidationResult): void {
  if (!result.success) {
    throw toValidationError(result.error);
  }
}

export function requestContext(c: Context<AppBindings>): RequestContext {
  return { ip: c.get('clientIp'), requestId: c.get('requestId') };
}
