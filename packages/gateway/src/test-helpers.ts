/**
 * Shared Test Helpers
 *
 * Reusable mock factories and in-process stand-ins for gateway tests.
 *
 * Usage:
 *   import { createMockAdapter, InMemoryMemoryRepository } from '../test-helpers.js';
 */

import { vi } from 'vitest';
import type { EncryptedMemoryRow, MemoryRecord, MemorySummary } from '@memvault/core';
import type { MemoryRepository } from './db/repositories/memories.js';

// ============================================================
// Mock Log
// ============================================================

/**
 * Create a mock log object matching the getLog() return type.
 */
export function createMockLog() {
  const log = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => log),
  };
  return log;
}

// ============================================================
// Mock Database Adapter
// ============================================================

/**
 * Create a mock database adapter matching the DatabaseAdapter interface.
 * Methods have default return values; override per test with mockResolvedValueOnce.
 */
export function createMockAdapter() {
  return {
    type: 'postgres' as const,
    isConnected: vi.fn(() => true),
    query: vi.fn(async (_sql: string, _params?: unknown[]): Promise<object[]> => []),
    queryOne: vi.fn(async (_sql: string, _params?: unknown[]): Promise<object | null> => null),
    execute: vi.fn(async (_sql: string, _params?: unknown[]) => ({ changes: 1 })),
    exec: vi.fn(async (_sql: string) => {}),
    close: vi.fn(async () => {}),
  };
}

// ============================================================
// In-memory Memory Repository
// ============================================================

function byCreatedThenId(a: MemoryRecord, b: MemoryRecord): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}

/**
 * In-process MemoryRepository with the same ordering as the PostgreSQL one.
 * Set `unavailable` to simulate a lost database.
 */
export class InMemoryMemoryRepository implements MemoryRepository {
  readonly records = new Map<string, MemoryRecord>();
  unavailable: Error | null = null;

  async insert(record: MemoryRecord): Promise<void> {
    this.check();
    this.records.set(record.id, { ...record, tags: [...record.tags] });
  }

  async listByOwner(ownerId: string): Promise<MemorySummary[]> {
    return this.owned(ownerId).map(({ encBlob: _encBlob, ...summary }) => summary);
  }

  async listEncryptedByOwner(ownerId: string): Promise<EncryptedMemoryRow[]> {
    return this.owned(ownerId).map(({ id, key, tags, createdAt, encBlob }) => ({
      id,
      key,
      tags,
      createdAt,
      encBlob,
    }));
  }

  async getEncryptedBlob(id: string): Promise<string | null> {
    this.check();
    return this.records.get(id)?.encBlob ?? null;
  }

  async delete(id: string): Promise<number> {
    this.check();
    return this.records.delete(id) ? 1 : 0;
  }

  private owned(ownerId: string): MemoryRecord[] {
    this.check();
    return [...this.records.values()]
      .filter((record) => record.ownerId === ownerId)
      .sort(byCreatedThenId)
      .map((record) => ({ ...record, tags: [...record.tags] }));
  }

  private check(): void {
    if (this.unavailable) throw this.unavailable;
  }
}
