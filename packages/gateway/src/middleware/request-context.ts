/**
 * Per-request context: request id and response timing
 */

import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'node:crypto';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

// Alphanumerics plus . _ : = - (up to 128 chars)
const VALID_REQUEST_ID = /^[a-zA-Z0-9._:=-]{1,128}$/;

/**
 * Reuse a well-formed caller X-Request-ID, otherwise mint one; echo it back
 */
export const requestId = createMiddleware(async (c, next) => {
  const header = c.req.header('X-Request-ID');
  const id = header && VALID_REQUEST_ID.test(header) ? header : randomUUID();
  c.set('requestId', id);
  c.header('X-Request-ID', id);
  await next();
});

/**
 * Report handler time in X-Response-Time
 */
export const timing = createMiddleware(async (c, next) => {
  const start = performance.now();

  await next();

  c.header('X-Response-Time', `${(performance.now() - start).toFixed(2)}ms`);
});
