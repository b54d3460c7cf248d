/**
 * MemoryService Tests
 *
 * Real CipherService over the in-process repository.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { randomBytes } from 'node:crypto';
import {
  CipherService,
  DecryptionError,
  NotFoundError,
  StoreUnavailableError,
  ValidationError,
} from '@memvault/core';
import { InMemoryMemoryRepository } from '../test-helpers.js';
import { MemoryService } from './memory-service.js';

function sequentialIds(): () => string {
  let n = 0;
  return () => `mem-${String(++n).padStart(3, '0')}`;
}

describe('MemoryService', () => {
  let repository: InMemoryMemoryRepository;
  let cipher: CipherService;
  let service: MemoryService;
  let clock: Date;

  beforeEach(() => {
    repository = new InMemoryMemoryRepository();
    cipher = new CipherService(randomBytes(32));
    clock = new Date('2026-05-01T08:00:00.000Z');
    service = new MemoryService({
      repository,
      cipher,
      now: () => clock,
      generateId: sequentialIds(),
    });
  });

  describe('save', () => {
    it('stores an encrypted record stamped with the current time', async () => {
      const record = await service.save({ ownerId: 'u1', key: 'diary', data: 'I feel so lonely today' });

      expect(record).toMatchObject({
        id: 'mem-001',
        ownerId: 'u1',
        key: 'diary',
        tags: ['sad'],
        createdAt: '2026-05-01T08:00:00.000Z',
        updatedAt: '2026-05-01T08:00:00.000Z',
        version: 1,
      });
      expect(record.encBlob).not.toContain('lonely');
      expect(cipher.decrypt(record.encBlob)).toBe('I feel so lonely today');
      expect(repository.records.get('mem-001')?.encBlob).toBe(record.encBlob);
    });

    it('defaults key to an empty string and tags to the derived emotion only', async () => {
      const record = await service.save({ ownerId: 'u1', data: 'nothing notable' });
      expect(record.key).toBe('');
      expect(record.tags).toEqual([]);
    });

    it('does not duplicate a caller tag that matches the emotion', async () => {
      const record = await service.save({ ownerId: 'u1', tags: ['happy'], data: 'I am so happy' });
      expect(record.tags).toEqual(['happy']);
    });

    it('appends the emotion after caller tags and drops duplicates', async () => {
      const record = await service.save({
        ownerId: 'u1',
        tags: ['work', 'work', 'late'],
        data: 'Furious about the meeting',
      });
      expect(record.tags).toEqual(['work', 'late', 'angry']);
    });

    it('uses the first emotion in priority order', async () => {
      const record = await service.save({ ownerId: 'u1', data: 'I am sad but happy' });
      expect(record.tags).toEqual(['sad']);
    });

    it('accepts empty text', async () => {
      const record = await service.save({ ownerId: 'u1', data: '' });
      expect(await service.download(record.id)).toBe('');
    });

    it('rejects a blank owner', async () => {
      await expect(service.save({ ownerId: '   ', data: 'x' })).rejects.toBeInstanceOf(ValidationError);
      await expect(service.save({ ownerId: '', data: 'x' })).rejects.toThrow(
        'Validation failed: owner_id is required'
      );
      expect(repository.records.size).toBe(0);
    });

    it('surfaces an unreachable store', async () => {
      repository.unavailable = new StoreUnavailableError();
      await expect(service.save({ ownerId: 'u1', data: 'x' })).rejects.toBeInstanceOf(StoreUnavailableError);
    });
  });

  describe('list', () => {
    it('returns metadata oldest first without ciphertext', async () => {
      await service.save({ ownerId: 'u1', key: 'first', data: 'a' });
      clock = new Date('2026-05-01T09:00:00.000Z');
      await service.save({ ownerId: 'u1', key: 'second', data: 'b' });

      const items = await service.list('u1');
      expect(items.map((item) => item.key)).toEqual(['first', 'second']);
      expect(items[0]).toEqual({
        id: 'mem-001',
        ownerId: 'u1',
        key: 'first',
        tags: [],
        createdAt: '2026-05-01T08:00:00.000Z',
        updatedAt: '2026-05-01T08:00:00.000Z',
        version: 1,
      });
      expect(items[0]).not.toHaveProperty('encBlob');
    });

    it('breaks timestamp ties by id', async () => {
      await service.save({ ownerId: 'u1', data: 'a' });
      await service.save({ ownerId: 'u1', data: 'b' });
      expect((await service.list('u1')).map((item) => item.id)).toEqual(['mem-001', 'mem-002']);
    });

    it('isolates owners', async () => {
      await service.save({ ownerId: 'u1', data: 'mine' });
      await service.save({ ownerId: 'u2', data: 'theirs' });

      expect((await service.list('u1')).map((item) => item.ownerId)).toEqual(['u1']);
      expect(await service.list('nobody')).toEqual([]);
    });
  });

  describe('download', () => {
    it('returns the decrypted text', async () => {
      const record = await service.save({ ownerId: 'u1', data: 'I feel so lonely today' });
      expect(await service.download(record.id)).toBe('I feel so lonely today');
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(service.download('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('throws DecryptionError when the row was sealed under another key', async () => {
      const foreign = new CipherService(randomBytes(32));
      const record = await service.save({ ownerId: 'u1', data: 'secret' });
      repository.records.set(record.id, { ...record, encBlob: foreign.encrypt('secret') });

      await expect(service.download(record.id)).rejects.toBeInstanceOf(DecryptionError);
    });
  });

  describe('delete', () => {
    it('removes the record and reports the id', async () => {
      const record = await service.save({ ownerId: 'u1', data: 'x' });
      expect(await service.delete(record.id)).toBe(record.id);
      await expect(service.download(record.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('is idempotent', async () => {
      const record = await service.save({ ownerId: 'u1', data: 'x' });
      await service.delete(record.id);
      expect(await service.delete(record.id)).toBe(record.id);
      expect(await service.delete('never-existed')).toBe('never-existed');
    });
  });

  describe('query', () => {
    beforeEach(async () => {
      await service.save({ ownerId: 'u1', tags: ['angry'], data: 'Something about a banana' });
      await service.save({ ownerId: 'u1', data: 'Lunch with friends was great' });
      await service.save({ ownerId: 'u1', data: 'Plain note' });
      await service.save({ ownerId: 'u2', data: 'banana for someone else' });
    });

    it('matches emotion or keyword', async () => {
      const outcome = await service.query('u1', { emotion: 'happy', keyword: 'BANANA' });
      expect(outcome.results.map((m) => m.text)).toEqual([
        'Something about a banana',
        'Lunch with friends was great',
      ]);
      expect(outcome.skipped).toBe(0);
    });

    it('matches on emotion even when the keyword misses', async () => {
      const outcome = await service.query('u1', { emotion: 'angry', keyword: 'apple' });
      expect(outcome.results.map((m) => m.id)).toEqual(['mem-001']);
    });

    it('requires both filters in all mode', async () => {
      expect((await service.query('u1', { emotion: 'angry', keyword: 'apple', match: 'all' })).results).toEqual([]);
      expect(
        (await service.query('u1', { emotion: 'angry', keyword: 'banana', match: 'all' })).results.map((m) => m.id)
      ).toEqual(['mem-001']);
    });

    it('returns decrypted hits with metadata', async () => {
      const outcome = await service.query('u1', { keyword: 'plain' });
      expect(outcome.results).toEqual([
        {
          id: 'mem-003',
          key: '',
          tags: [],
          createdAt: '2026-05-01T08:00:00.000Z',
          text: 'Plain note',
        },
      ]);
    });

    it('returns nothing without filters', async () => {
      expect(await service.query('u1', {})).toEqual({ results: [], skipped: 0 });
      expect(await service.query('u1', { emotion: '', keyword: '' })).toEqual({ results: [], skipped: 0 });
    });

    it('skips and counts rows that fail to decrypt', async () => {
      const foreign = new CipherService(randomBytes(32));
      const victim = repository.records.get('mem-001');
      expect(victim).toBeDefined();
      if (victim) {
        repository.records.set(victim.id, { ...victim, encBlob: foreign.encrypt(victim.id) });
      }

      const outcome = await service.query('u1', { keyword: 'a' });
      expect(outcome.skipped).toBe(1);
      expect(outcome.results.map((m) => m.id)).toEqual(['mem-002', 'mem-003']);
    });
  });
});
