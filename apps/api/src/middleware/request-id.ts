import type { Context, Next } from 'hono';
import { randomUUID } from 'node:crypto';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Request ID middleware
 * Reuses a well-formed incoming X-Request-Id, otherwise generates one.
 * The id correlates log lines and identifies SSE subscribers.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const existingRequestId = c.req.header('x-request-id') || c.req.header('x-correlation-id');

  const requestId =
    existingRequestId && REQUEST_ID_PATTERN.test(existingRequestId) ? existingRequestId : randomUUID();

  c.set('requestId', requestId);
  c.header('x-request-id', requestId);

  await next();
}
