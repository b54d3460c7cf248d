/**
 * Base Repository Class for PostgreSQL
 *
 * All repositories extend this class. Connection failures surface as
 * StoreUnavailableError; every other database error propagates unchanged.
 */

import { StoreUnavailableError, isAppError } from '@memvault/core';
import { getAdapterSync } from '../adapters/index.js';
import type { DatabaseAdapter, QueryParams, Row } from '../adapters/types.js';
import { isConnectionError } from '../errors.js';
import { getLog } from '../../services/log.js';

const log = getLog('Repository');

/**
 * Base class for all PostgreSQL repositories
 * Provides common database access methods
 */
export abstract class BaseRepository {
  /**
   * @param adapter - Adapter to use; defaults to the global adapter on first access
   */
  constructor(protected adapter: DatabaseAdapter | null = null) {}

  /**
   * Get the database adapter (global one unless injected)
   */
  protected getAdapter(): DatabaseAdapter {
    if (!this.adapter) {
      try {
        this.adapter = getAdapterSync();
      } catch (error) {
        throw new StoreUnavailableError(undefined, { cause: error });
      }
    }
    return this.adapter;
  }

  /**
   * Execute a query that returns rows
   */
  protected async query<T extends object = Row>(sql: string, params?: QueryParams): Promise<T[]> {
    return this.run(() => this.getAdapter().query<T>(sql, params));
  }

  /**
   * Execute a query that returns a single row
   */
  protected async queryOne<T extends object = Row>(sql: string, params?: QueryParams): Promise<T | null> {
    return this.run(() => this.getAdapter().queryOne<T>(sql, params));
  }

  /**
   * Execute a statement (INSERT, UPDATE, DELETE)
   */
  protected async execute(sql: string, params?: QueryParams): Promise<{ changes: number }> {
    return this.run(() => this.getAdapter().execute(sql, params));
  }

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isAppError(error)) throw error;
      if (isConnectionError(error)) {
        log.error('Database unreachable', error);
        throw new StoreUnavailableError(undefined, { cause: error });
      }
      throw error;
    }
  }
}
