/**
 * Memory Service
 *
 * Central business logic for the encrypted memory store.
 * HTTP routes delegate here. Plaintext lives only in memory for the
 * duration of a call and is never logged.
 */

import { randomUUID } from 'node:crypto';
import {
  MEMORY_RECORD_VERSION,
  NotFoundError,
  ValidationError,
  classifyEmotion,
  hasQueryFilter,
  mergeTags,
  scanMemories,
  type CipherService,
  type IMemoryService,
  type MemoryQueryFilter,
  type MemoryQueryOutcome,
  type MemoryRecord,
  type MemorySummary,
  type SaveMemoryInput,
} from '@memvault/core';
import type { MemoryRepository } from '../db/repositories/memories.js';
import { getLog } from './log.js';

const log = getLog('MemoryService');

export interface MemoryServiceDeps {
  repository: MemoryRepository;
  cipher: CipherService;
  /** Clock, for tests */
  now?: () => Date;
  /** Id generator, for tests */
  generateId?: () => string;
}

export class MemoryService implements IMemoryService {
  private readonly repository: MemoryRepository;
  private readonly cipher: CipherService;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(deps: MemoryServiceDeps) {
    this.repository = deps.repository;
    this.cipher = deps.cipher;
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
  }

  async save(input: SaveMemoryInput): Promise<MemoryRecord> {
    const { ownerId } = input;
    if (!ownerId.trim()) {
      throw new ValidationError('Validation failed: owner_id is required', { field: 'owner_id' });
    }

    const emotion = classifyEmotion(input.data);
    const timestamp = this.now().toISOString();
    const record: MemoryRecord = {
      id: this.generateId(),
      ownerId,
      key: input.key ?? '',
      tags: mergeTags(input.tags, emotion),
      createdAt: timestamp,
      updatedAt: timestamp,
      encBlob: this.cipher.encrypt(input.data),
      version: MEMORY_RECORD_VERSION,
    };

    await this.repository.insert(record);
    log.info('Memory saved', { id: record.id, ownerId, tags: record.tags });
    return record;
  }

  async list(ownerId: string): Promise<MemorySummary[]> {
    return this.repository.listByOwner(ownerId);
  }

  async download(id: string): Promise<string> {
    const blob = await this.repository.getEncryptedBlob(id);
    if (blob === null) {
      throw new NotFoundError('Memory', id);
    }
    return this.cipher.decrypt(blob);
  }

  async delete(id: string): Promise<string> {
    const removed = await this.repository.delete(id);
    log.info('Memory delete', { id, removed });
    return id;
  }

  async query(ownerId: string, filter: MemoryQueryFilter): Promise<MemoryQueryOutcome> {
    if (!hasQueryFilter(filter)) {
      return { results: [], skipped: 0 };
    }

    const rows = await this.repository.listEncryptedByOwner(ownerId);
    const outcome = scanMemories(rows, this.cipher, filter);
    if (outcome.skipped > 0) {
      log.warn('Skipped memories that failed to decrypt', {
        ownerId,
        skipped: outcome.skipped,
        scanned: rows.length,
      });
    }
    return outcome;
  }
}

export function createMemoryService(deps: MemoryServiceDeps): IMemoryService {
  return new MemoryService(deps);
}
