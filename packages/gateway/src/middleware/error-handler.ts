/**
 * Global error handler middleware
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import {
  AuthenticationError,
  DecryptionError,
  NotFoundError,
  StoreUnavailableError,
  ValidationError,
} from '@memvault/core';
import { ERROR_DETAILS, errorResponse } from '../routes/helpers.js';
import { getLog } from '../services/log.js';

const log = getLog('ErrorHandler');

/**
 * Global error handler. Every failure leaves as `{ detail }`; unexpected
 * errors are logged with the request id and never echoed to the client.
 */
export function errorHandler(err: Error, c: Context): Response {
  const requestId = c.get('requestId') ?? 'unknown';

  if (err instanceof AuthenticationError) {
    return errorResponse(c, ERROR_DETAILS.UNAUTHORIZED, 401);
  }

  if (err instanceof ValidationError) {
    return errorResponse(c, err.message, 422);
  }

  if (err instanceof NotFoundError) {
    return errorResponse(c, ERROR_DETAILS.NOT_FOUND, 404);
  }

  if (err instanceof StoreUnavailableError) {
    log.warn(`[${requestId}] Storage unavailable`, { path: c.req.path, reason: err.message });
    return errorResponse(c, ERROR_DETAILS.STORE_UNAVAILABLE, 503);
  }

  if (err instanceof DecryptionError) {
    log.error(`[${requestId}] Stored record could not be decrypted`, { path: c.req.path, reason: err.reason });
    return errorResponse(c, ERROR_DETAILS.INTERNAL, 500);
  }

  // Hono exceptions (body limit, malformed params)
  if (err instanceof HTTPException) {
    return errorResponse(c, err.message || 'Request failed', err.status);
  }

  // Malformed JSON from c.req.json()
  if (err instanceof SyntaxError && err.message.includes('JSON')) {
    return errorResponse(c, 'Validation failed: request body must be valid JSON', 422);
  }

  log.error(`[${requestId}] Unexpected error:`, err);
  return errorResponse(c, ERROR_DETAILS.INTERNAL, 500);
}

/**
 * Not found handler
 */
export function notFoundHandler(c: Context): Response {
  return errorResponse(c, ERROR_DETAILS.ROUTE_NOT_FOUND, 404);
}
