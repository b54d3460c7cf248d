/**
 * HTTP Server entry point
 *
 * Loads .env, builds the service registry, resolves the cipher key,
 * connects PostgreSQL and serves the Hono app until SIGINT/SIGTERM.
 */

import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';

import { serve } from '@hono/node-server';
import {
  initServiceRegistry,
  isLogLevel,
  loadCipherKey,
  resetServiceRegistry,
  Services,
  type LogLevel,
} from '@memvault/core';
import { createApp } from './app.js';
import { loadGatewayConfig } from './config/gateway-config.js';
import { SHUTDOWN_TIMEOUT_MS } from './config/defaults.js';
import { initializeAdapter, closeAdapter } from './db/adapters/index.js';
import { createMemoriesRepository } from './db/repositories/memories.js';
import { getKeyFilePath, initializeDataDirectory } from './paths/index.js';
import { createLogService } from './services/log-service-impl.js';
import { createMemoryService } from './services/memory-service.js';
import { getLog } from './services/log.js';
import { getErrorMessage } from './routes/helpers.js';

const log = getLog('Server');

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Load the first .env found: monorepo root, gateway package, working directory.
 * Returns the path that was loaded, if any.
 */
export function loadEnvFile(): string | undefined {
  const envPaths = [
    resolve(__dirname, '..', '..', '..', '.env'), // monorepo root from src/
    resolve(__dirname, '..', '.env'), // packages/gateway/.env
    resolve(process.cwd(), '.env'),
  ];

  for (const envPath of envPaths) {
    if (existsSync(envPath)) {
      loadDotenv({ path: envPath });
      return envPath;
    }
  }
  return undefined;
}

function resolveLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase() ?? '';
  return isLogLevel(value) ? value : 'info';
}

export interface RunningServer {
  server: ReturnType<typeof serve>;
  /** Stop listening and release the pool. Safe to call twice. */
  close(): Promise<void>;
}

/**
 * Start the server
 */
export async function startServer(): Promise<RunningServer> {
  const envPath = loadEnvFile();

  // ── ServiceRegistry ──────────────────────────────────────────────────────
  const registry = initServiceRegistry();

  // Log service first, everything else logs through it
  registry.register(Services.Log, createLogService({ level: resolveLogLevel(process.env.LOG_LEVEL) }));
  if (envPath) {
    log.info(`Loaded .env from: ${envPath}`);
  }

  const config = loadGatewayConfig();

  const dataDir = initializeDataDirectory();
  log.info(`Data directory: ${dataDir}`);

  const { cipher, source } = await loadCipherKey({
    envKey: process.env.MEMVAULT_ENCRYPTION_KEY,
    keyFilePath: getKeyFilePath(),
  });
  log.info('Cipher key loaded', { source });

  log.info('Initializing PostgreSQL database...');
  const adapter = await initializeAdapter();
  log.info(`PostgreSQL connected: ${adapter.isConnected()}`);

  registry.register(
    Services.Memory,
    createMemoryService({ repository: createMemoriesRepository(adapter), cipher })
  );

  if (config.auth.type === 'none') {
    const isExposed = config.host !== '127.0.0.1' && config.host !== 'localhost' && config.host !== '::1';
    if (isExposed) {
      log.warn(`Authentication is DISABLED on a network interface (HOST=${config.host}).`);
      log.warn('Set AUTH_TYPE=api-key and API_KEYS, or bind HOST=127.0.0.1.');
    } else {
      log.warn('Authentication is DISABLED (AUTH_TYPE=none).');
    }
  }

  const app = createApp(config);

  log.info('Starting MemVault...', {
    port: config.port,
    host: config.host,
    auth: config.auth.type,
    registeredServices: registry.list(),
  });

  const server = serve(
    {
      fetch: app.fetch,
      port: config.port,
      hostname: config.host,
    },
    (info) => {
      log.info(`Server running at http://${info.address}:${info.port}`);
      log.info(`Health: http://${info.address}:${info.port}/health`);
    }
  );

  // ── Shutdown ──────────────────────────────────────────────────────────────
  let closing: Promise<void> | null = null;

  async function shutdown(): Promise<void> {
    await new Promise<void>((done) => {
      server.close((error) => {
        if (error) log.warn('HTTP close error', { error: error.message });
        done();
      });
    });
    try {
      await closeAdapter();
    } catch (error) {
      log.warn('DB close error', { error: getErrorMessage(error) });
    }
    await resetServiceRegistry();
  }

  return {
    server,
    close: () => {
      closing ??= shutdown();
      return closing;
    },
  };
}

/**
 * Run until a signal arrives, then shut down within SHUTDOWN_TIMEOUT_MS
 */
export async function runServer(): Promise<void> {
  const running = await startServer();

  const onSignal = (signal: string) => {
    log.info(`Received ${signal}, shutting down gracefully...`);
    setTimeout(() => process.exit(1), SHUTDOWN_TIMEOUT_MS).unref();
    running.close().then(
      () => {
        log.info('Cleanup complete, exiting.');
        process.exit(0);
      },
      (error: unknown) => {
        log.error('Shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', () => onSignal('SIGINT'));
  process.once('SIGTERM', () => onSignal('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled Promise Rejection', { reason: String(reason) });
  });
}

// Run when executed directly
const entry = process.argv[1];
if (entry && resolve(entry) === fileURLToPath(import.meta.url)) {
  runServer().catch((err: unknown) => {
    log.error('Fatal: server startup failed', {
      error: getErrorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  });
}
