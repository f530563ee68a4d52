import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';

// Upstream ids longer than this, or with odd characters, are replaced.
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Request ID middleware
 * Reuses an upstream id (load balancer, proxy) when it looks sane, otherwise
 * generates one. The id is used for log correlation and audit trails.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const existingRequestId = c.req.header('x-request-id') || c.req.header('x-correlation-id');

  const requestId =
    existingRequestId && REQUEST_ID_PATTERN.test(existingRequestId) ? existingRequestId : randomUUID();

  c.set('requestId', requestId);

  // Add to response headers for client correlation
  c.header('x-request-id', requestId);

  await next();
}
