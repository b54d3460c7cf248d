/**
 * Health check routes
 */

import { Hono } from 'hono';
import { VERSION } from '@memvault/core';
import { tryGetAdapter } from '../db/adapters/index.js';
import { ERROR_DETAILS, errorResponse, getErrorMessage, okResponse } from './helpers.js';
import { getLog } from '../services/log.js';

const log = getLog('Health');

const startTime = Date.now();

export const healthRoutes = new Hono();

/**
 * Probe the database with a round trip
 */
export async function checkDatabase(): Promise<boolean> {
  const adapter = tryGetAdapter();
  if (!adapter?.isConnected()) return false;

  try {
    await adapter.queryOne<{ ok: number }>('SELECT 1 AS ok');
    return true;
  } catch (error) {
    log.debug('Database probe failed', { error: getErrorMessage(error) });
    return false;
  }
}

/**
 * Basic health check with database connectivity
 */
healthRoutes.get('/', async (c) => {
  const connected = await checkDatabase();

  return c.json({
    status: connected ? 'ok' : 'degraded',
    database: { connected },
    version: VERSION,
    uptime: (Date.now() - startTime) / 1000,
  });
});

/**
 * Liveness probe
 */
healthRoutes.get('/live', (c) => {
  return okResponse(c, {});
});

/**
 * Readiness probe: not ready until the database answers
 */
healthRoutes.get('/ready', async (c) => {
  if (!(await checkDatabase())) {
    return errorResponse(c, ERROR_DETAILS.STORE_UNAVAILABLE, 503);
  }
  return okResponse(c, {});
});
