import { describe, it, expect, vi } from 'vitest';
import { INDEXES_SQL, SCHEMA_SQL, initializeSchema } from './schema.js';

describe('initializeSchema', () => {
  it('creates the table before its index', async () => {
    const exec = vi.fn(async (_sql: string) => {});
    await initializeSchema(exec);

    expect(exec.mock.calls.map(([sql]) => sql)).toEqual([SCHEMA_SQL, INDEXES_SQL]);
  });

  it('defines every memories column', () => {
    for (const column of ['id', 'owner_id', 'key', 'tags', 'created_at', 'updated_at', 'enc_blob', 'version']) {
      expect(SCHEMA_SQL).toMatch(new RegExp(`\\n\\s+${column} `));
    }
    expect(INDEXES_SQL).toContain('ON memories(owner_id, created_at)');
  });
});
