/**
 * Authentication middleware
 * Shared-secret API keys via X-API-Key or Authorization: Bearer
 */

import { createMiddleware } from 'hono/factory';
import type { Context } from 'hono';
import { AuthenticationError } from '@memvault/core';
import type { AuthConfig } from '../types/index.js';
import { safeKeyCompare } from '../routes/helpers.js';
import { getLog } from '../services/log.js';

const log = getLog('Auth');

/**
 * Candidate key from the request. X-API-Key wins over a Bearer token.
 */
export function extractApiKey(c: Context): string | undefined {
  const headerKey = c.req.header('X-API-Key');
  if (headerKey) return headerKey;

  const authHeader = c.req.header('Authorization');
  return authHeader?.startsWith('Bearer ') ? authHeader.slice(7) : undefined;
}

/**
 * Check the candidate against every configured key without short-circuiting
 */
function apiKeyMatches(candidate: string, validKeys: readonly string[]): boolean {
  let matched = false;
  for (const key of validKeys) {
    if (safeKeyCompare(candidate, key)) matched = true;
  }
  return matched;
}

/**
 * Create authentication middleware.
 * Missing and wrong keys throw the same AuthenticationError; the app's
 * error handler turns it into the 401.
 */
export function createAuthMiddleware(config: AuthConfig) {
  if (config.type === 'api-key' && !config.apiKeys?.length) {
    log.warn('No API keys configured; every authenticated request will be rejected');
  }

  return createMiddleware(async (c, next) => {
    if (config.type === 'none') {
      return next();
    }

    const apiKey = extractApiKey(c);
    if (!apiKey || !apiKeyMatches(apiKey, config.apiKeys ?? [])) {
      log.debug('Rejected request', { path: c.req.path, keyPresent: Boolean(apiKey) });
      throw new AuthenticationError();
    }

    return next();
  });
}
