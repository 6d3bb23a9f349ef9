import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';
import type { AppBindings } from '../types/context.js';

const MAX_INCOMING_ID_LENGTH = 128;

/**
 * Request ID middleware
 * Generates a unique request ID for each request and attaches it to the context
 * The request ID is used for log correlation and audit trails
 */
export async function requestIdMiddleware(c: Context<AppBindings>, next: Next) {
  // Check if request ID is already set (e.g., from load balancer)
  const existingRequestId = c.req.header('x-request-id') || c.req.header('x-correlation-id');

  const requestId =
    existingRequestId && existingRequestId.length <= MAX_INCOMING_ID_LENGTH ? existingRequestId : randomUUID();

  c.set('requestId', requestId);

  // Add to response headers for client correlation
  c.header('x-request-id', requestId);

  await next();
}
