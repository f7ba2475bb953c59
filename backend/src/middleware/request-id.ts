/**
 * Request ID Middleware v1.0.0
 *
 * Attaches a unique request ID to every incoming request for tracing.
 *
 * The ID is:
 * - Generated as a ULID (time-sortable, unique)
 * - Attached to the response as `X-Request-Id` header
 * - Available in the Hono context for logging: `c.get('requestId')`
 *
 * If the client sends an `X-Request-Id` header, it's reused (for end-to-end tracing).
 */

import type { MiddlewareHandler } from 'hono';
import { ulid } from 'ulidx';

export type RequestIdVariables = {
  requestId: string;
};

/**
 * Hono middleware: inject request ID into every request
 */
export const requestIdMiddleware: MiddlewareHandler<{ Variables: RequestIdVariables }> = async (c, next) => {
  const requestId = c.req.header('x-request-id') || `req_${ulid()}`;

  c.set('requestId', requestId);
  c.header('X-Request-Id', requestId);

  await next();
};
