/**
 * Hono application setup
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';

import type { GatewayConfig } from './types/index.js';
import {
  requestId,
  timing,
  createAuthMiddleware,
  errorHandler,
  notFoundHandler,
} from './middleware/index.js';
import { healthRoutes, memoriesRoutes, rootRoutes, SKIPPED_RECORDS_HEADER } from './routes/index.js';
import { errorResponse } from './routes/helpers.js';
import {
  DEFAULT_BODY_LIMIT_BYTES,
  DEFAULT_HOST,
  DEFAULT_PORT,
  SECONDS_PER_DAY,
} from './config/defaults.js';
import { getLog } from './services/log.js';

const log = getLog('HTTP');

const DEFAULT_CONFIG: GatewayConfig = {
  port: DEFAULT_PORT,
  host: DEFAULT_HOST,
  auth: {
    type: 'api-key',
  },
  bodyLimit: DEFAULT_BODY_LIMIT_BYTES,
};

/**
 * Create the Hono application
 */
export function createApp(config: Partial<GatewayConfig> = {}): Hono {
  const fullConfig: GatewayConfig = { ...DEFAULT_CONFIG, ...config };

  const app = new Hono();

  // Security headers (includes HSTS for HTTPS deployments)
  app.use(
    '*',
    secureHeaders({
      strictTransportSecurity: 'max-age=63072000; includeSubDomains; preload',
    })
  );

  // CORS: only the configured origins, never a wildcard
  app.use(
    '*',
    cors({
      origin: fullConfig.corsOrigins ?? [],
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization', 'X-API-Key', 'X-Request-ID'],
      exposeHeaders: ['X-Request-ID', 'X-Response-Time', SKIPPED_RECORDS_HEADER],
      maxAge: SECONDS_PER_DAY,
      credentials: true,
    })
  );

  const maxBodySize = fullConfig.bodyLimit ?? DEFAULT_BODY_LIMIT_BYTES;
  app.use(
    '/v1/*',
    bodyLimit({
      maxSize: maxBodySize,
      onError: (c) => errorResponse(c, `Request body exceeds ${maxBodySize} bytes`, 413),
    })
  );

  app.use('*', requestId);
  app.use('*', timing);

  // Request log (skip in test environment)
  if (process.env.NODE_ENV !== 'test') {
    app.use('*', logger((message) => log.info(message)));
  }

  app.use('/v1/*', createAuthMiddleware(fullConfig.auth));

  // Mount routes
  app.route('/v1', memoriesRoutes);
  app.route('/health', healthRoutes);
  app.route('/', rootRoutes);

  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}
