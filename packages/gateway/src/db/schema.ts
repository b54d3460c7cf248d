/**
 * PostgreSQL Schema Definition
 *
 * Table definitions for the MemVault database
 */

import { getLog } from '../services/log.js';

const log = getLog('Schema');

export const SCHEMA_SQL = `
-- Encrypted memories. enc_blob holds a cipher token, never plaintext.
-- Timestamps are ISO-8601 UTC text as written by the service.
CREATE TABLE IF NOT EXISTS memories (
  id TEXT PRIMARY KEY,
  owner_id TEXT NOT NULL,
  key TEXT NOT NULL DEFAULT '',
  tags TEXT NOT NULL DEFAULT '[]',
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  enc_blob TEXT NOT NULL,
  version INTEGER NOT NULL DEFAULT 1
);
`;

export const INDEXES_SQL = `
CREATE INDEX IF NOT EXISTS idx_memories_owner_created ON memories(owner_id, created_at);
`;

/**
 * Create tables and indexes
 */
export async function initializeSchema(exec: (sql: string) => Promise<void>): Promise<void> {
  log.info('Initializing PostgreSQL schema...');

  await exec(SCHEMA_SQL);
  await exec(INDEXES_SQL);

  log.info('PostgreSQL schema initialized');
}
