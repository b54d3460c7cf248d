/**
 * PostgreSQL Database Adapter
 *
 * Uses the 'pg' package with connection pooling
 */

import type { DatabaseAdapter, DatabaseConfig, Row, QueryParams } from './types.js';
import pg from 'pg';
import { StoreUnavailableError } from '@memvault/core';
import { getLog } from '../../services/log.js';
import { DB_POOL_MAX, DB_IDLE_TIMEOUT_MS, DB_CONNECT_TIMEOUT_MS } from '../../config/defaults.js';

const log = getLog('PostgresAdapter');

const { Pool } = pg;
type PoolType = InstanceType<typeof Pool>;

export class PostgresAdapter implements DatabaseAdapter {
  readonly type = 'postgres' as const;
  private pool: PoolType | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /**
   * Initialize the connection pool and verify connectivity
   */
  async initialize(): Promise<void> {
    const pool = new Pool({
      connectionString: this.config.postgresUrl,
      max: this.config.postgresPoolSize || DB_POOL_MAX,
      idleTimeoutMillis: DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: DB_CONNECT_TIMEOUT_MS,
    });

    // Idle clients can error when the server goes away; the next query reports it
    pool.on('error', (error) => {
      log.error('Idle client error', { error: error.message });
    });

    try {
      const client = await pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
    } catch (error) {
      await pool.end();
      throw error;
    }

    this.pool = pool;
    log.info(`Connected to ${this.config.postgresHost}`);
  }

  isConnected(): boolean {
    return this.pool !== null;
  }

  async query<T extends object = Row>(sql: string, params: QueryParams = []): Promise<T[]> {
    const result = await this.requirePool().query(this.convertPlaceholders(sql), params);
    return result.rows as T[];
  }

  async queryOne<T extends object = Row>(sql: string, params: QueryParams = []): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async execute(sql: string, params: QueryParams = []): Promise<{ changes: number }> {
    const result = await this.requirePool().query(this.convertPlaceholders(sql), params);
    return { changes: result.rowCount ?? 0 };
  }

  async exec(sql: string): Promise<void> {
    await this.requirePool().query(sql);
  }

  async close(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
      log.info('Connection pool closed');
    }
  }

  private requirePool(): PoolType {
    if (!this.pool) throw new StoreUnavailableError('Database not initialized');
    return this.pool;
  }

  /**
   * Convert `?` placeholders to PostgreSQL $1, $2, etc.
   */
  private convertPlaceholders(sql: string): string {
    let index = 0;
    return sql.replace(/\?/g, () => {
      index++;
      return `$${index}`;
    });
  }
}
