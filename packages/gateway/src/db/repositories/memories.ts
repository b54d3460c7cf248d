/**
 * Memories Repository (PostgreSQL)
 *
 * Persists encrypted memory records. Plaintext never reaches this layer.
 */

import { z } from 'zod';
import type { EncryptedMemoryRow, MemoryRecord, MemorySummary } from '@memvault/core';
import type { DatabaseAdapter } from '../adapters/types.js';
import { BaseRepository } from './base.js';
import { getLog } from '../../services/log.js';

const log = getLog('MemoriesRepo');

/**
 * Storage contract for the memory service.
 * PostgreSQL in production, an in-process store in tests.
 */
export interface MemoryRepository {
  insert(record: MemoryRecord): Promise<void>;
  /** Oldest first, ties broken by id */
  listByOwner(ownerId: string): Promise<MemorySummary[]>;
  /** Same order as listByOwner */
  listEncryptedByOwner(ownerId: string): Promise<EncryptedMemoryRow[]>;
  getEncryptedBlob(id: string): Promise<string | null>;
  /** Number of rows removed (0 or 1) */
  delete(id: string): Promise<number>;
}

interface MemorySummaryRow {
  id: string;
  owner_id: string;
  key: string;
  tags: unknown;
  created_at: string;
  updated_at: string;
  version: number;
}

interface EncryptedRow {
  id: string;
  key: string;
  tags: unknown;
  created_at: string;
  enc_blob: string;
}

const tagsSchema = z.array(z.string());

/**
 * Tags are stored as JSON text; accept an already-decoded array too.
 */
export function parseTags(raw: unknown, id: string): string[] {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      log.warn('Unreadable tags column', { id });
      return [];
    }
  }
  const parsed = tagsSchema.safeParse(value);
  if (!parsed.success) {
    log.warn('Unexpected tags shape', { id });
    return [];
  }
  return parsed.data;
}

function rowToSummary(row: MemorySummaryRow): MemorySummary {
  return {
    id: row.id,
    ownerId: row.owner_id,
    key: row.key,
    tags: parseTags(row.tags, row.id),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    version: row.version,
  };
}

function rowToEncrypted(row: EncryptedRow): EncryptedMemoryRow {
  return {
    id: row.id,
    key: row.key,
    tags: parseTags(row.tags, row.id),
    createdAt: row.created_at,
    encBlob: row.enc_blob,
  };
}

export class MemoriesRepository extends BaseRepository implements MemoryRepository {
  async insert(record: MemoryRecord): Promise<void> {
    await this.execute(
      `INSERT INTO memories (id, owner_id, key, tags, created_at, updated_at, enc_blob, version)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        record.id,
        record.ownerId,
        record.key,
        JSON.stringify(record.tags),
        record.createdAt,
        record.updatedAt,
        record.encBlob,
        record.version,
      ]
    );
  }

  async listByOwner(ownerId: string): Promise<MemorySummary[]> {
    const rows = await this.query<MemorySummaryRow>(
      `SELECT id, owner_id, key, tags, created_at, updated_at, version
       FROM memories WHERE owner_id = $1
       ORDER BY created_at ASC, id ASC`,
      [ownerId]
    );
    return rows.map(rowToSummary);
  }

  async listEncryptedByOwner(ownerId: string): Promise<EncryptedMemoryRow[]> {
    const rows = await this.query<EncryptedRow>(
      `SELECT id, key, tags, created_at, enc_blob
       FROM memories WHERE owner_id = $1
       ORDER BY created_at ASC, id ASC`,
      [ownerId]
    );
    return rows.map(rowToEncrypted);
  }

  async getEncryptedBlob(id: string): Promise<string | null> {
    const row = await this.queryOne<{ enc_blob: string }>(
      `SELECT enc_blob FROM memories WHERE id = $1`,
      [id]
    );
    return row?.enc_blob ?? null;
  }

  async delete(id: string): Promise<number> {
    const result = await this.execute(`DELETE FROM memories WHERE id = $1`, [id]);
    return result.changes;
  }
}

export function createMemoriesRepository(adapter?: DatabaseAdapter): MemoriesRepository {
  return new MemoriesRepository(adapter ?? null);
}
