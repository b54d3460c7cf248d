/**
 * Database Adapter Types
 *
 * Database Adapter abstract interface (PostgreSQL)
 */

import { getLog } from '../../services/log.js';
import { DB_POOL_MAX } from '../../config/defaults.js';

const log = getLog('DbAdapter');

export type DatabaseType = 'postgres';

/**
 * Query result row - generic object
 * Repositories should always provide explicit row interfaces via type parameters.
 */
export type Row = Record<string, unknown>;

/**
 * Query parameters
 */
export type QueryParams = unknown[];

/**
 * Database adapter interface
 * All database operations go through this interface.
 * Statements may use `?` placeholders; adapters translate them.
 */
export interface DatabaseAdapter {
  /** Database type identifier */
  readonly type: DatabaseType;

  /** Check if connection is active */
  isConnected(): boolean;

  /**
   * Execute a query that returns rows
   */
  query<T extends object = Row>(sql: string, params?: QueryParams): Promise<T[]>;

  /**
   * Execute a query that returns a single row
   */
  queryOne<T extends object = Row>(sql: string, params?: QueryParams): Promise<T | null>;

  /**
   * Execute a statement (INSERT, UPDATE, DELETE)
   * Returns the number of affected rows
   */
  execute(sql: string, params?: QueryParams): Promise<{ changes: number }>;

  /**
   * Execute raw SQL (for schema changes)
   */
  exec(sql: string): Promise<void>;

  /**
   * Close the database connection
   */
  close(): Promise<void>;
}

/**
 * Database configuration
 */
export interface DatabaseConfig {
  type: DatabaseType;
  postgresUrl: string;
  postgresHost: string;
  postgresPoolSize: number;
}

/**
 * Get database configuration from environment.
 *
 * DATABASE_URL wins; otherwise the URL is built from POSTGRES_* with
 * defaults for the local Docker Compose setup.
 */
export function getDatabaseConfig(env: Record<string, string | undefined> = process.env): DatabaseConfig {
  const hasExplicitConfig = !!(env.DATABASE_URL || env.POSTGRES_HOST || env.POSTGRES_PASSWORD);

  if (env.NODE_ENV === 'production' && !hasExplicitConfig) {
    log.warn(
      'Running in production without explicit database credentials. ' +
        'Set DATABASE_URL or POSTGRES_* environment variables.'
    );
  }

  const host = env.POSTGRES_HOST || 'localhost';
  const user = encodeURIComponent(env.POSTGRES_USER || 'memvault');
  const password = encodeURIComponent(env.POSTGRES_PASSWORD || 'memvault_secret');
  const port = env.POSTGRES_PORT || '5432';
  const database = env.POSTGRES_DB || 'memvault';

  const poolSize = env.POSTGRES_POOL_SIZE ? parseInt(env.POSTGRES_POOL_SIZE, 10) : DB_POOL_MAX;

  return {
    type: 'postgres',
    postgresUrl: env.DATABASE_URL || `postgresql://${user}:${password}@${host}:${port}/${database}`,
    postgresHost: host,
    postgresPoolSize: Number.isNaN(poolSize) || poolSize < 1 ? DB_POOL_MAX : poolSize,
  };
}
