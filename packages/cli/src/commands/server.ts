/**
 * Server command - starts the HTTP API server
 *
 * Flags override the environment; everything else comes from .env and
 * the process environment.
 */

import { runServer } from '@memvault/gateway';

export interface ServerOptions {
  port?: string;
  host?: string;
  auth?: boolean;
}

export async function startServer(options: ServerOptions): Promise<void> {
  if (options.port !== undefined) {
    const port = Number(options.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      console.error(`❌ Invalid port: ${options.port}`);
      process.exit(1);
      return;
    }
    process.env.PORT = String(port);
  }
  if (options.host) {
    process.env.HOST = options.host;
  }
  if (options.auth === false) {
    process.env.AUTH_TYPE = 'none';
  }

  try {
    await runServer();
  } catch (err) {
    console.error('❌ Server failed to start:', err instanceof Error ? err.message : err);
    process.exit(1);
  }
}
