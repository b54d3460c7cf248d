/**
 * Database Adapters
 *
 * PostgreSQL is the only supported database
 */

export * from './types.js';
export { PostgresAdapter } from './postgres-adapter.js';

import type { DatabaseAdapter, DatabaseConfig } from './types.js';
import { getDatabaseConfig } from './types.js';
import { PostgresAdapter } from './postgres-adapter.js';
import { initializeSchema } from '../schema.js';
import { getLog } from '../../services/log.js';

const log = getLog('DbAdapter');

let adapter: DatabaseAdapter | null = null;

/**
 * Create and initialize a PostgreSQL database adapter, creating the schema
 */
export async function createAdapter(config?: DatabaseConfig): Promise<DatabaseAdapter> {
  const dbConfig = config ?? getDatabaseConfig();
  const pgAdapter = new PostgresAdapter(dbConfig);
  await pgAdapter.initialize();
  await initializeSchema(async (sql) => pgAdapter.exec(sql));
  return pgAdapter;
}

/**
 * Initialize the global adapter
 */
export async function initializeAdapter(config?: DatabaseConfig): Promise<DatabaseAdapter> {
  if (adapter) {
    log.info('Adapter already initialized');
    return adapter;
  }
  adapter = await createAdapter(config);
  return adapter;
}

/**
 * Get the global adapter synchronously (must be initialized first)
 */
export function getAdapterSync(): DatabaseAdapter {
  if (!adapter) {
    throw new Error('Database adapter not initialized. Call initializeAdapter() first.');
  }
  return adapter;
}

/**
 * Get the global adapter, or null before initialization
 */
export function tryGetAdapter(): DatabaseAdapter | null {
  return adapter;
}

/**
 * Close the global adapter
 */
export async function closeAdapter(): Promise<void> {
  if (adapter) {
    const current = adapter;
    adapter = null;
    await current.close();
  }
}
