/**
 * Memory query matching
 *
 * Scans one owner's rows, decrypting each on demand. Rows that fail to
 * decrypt are dropped from the results and counted as skipped.
 */

import type { CipherService } from '../crypto/cipher-service.js';
import { type Result, ok, err, partition } from '../types/result.js';
import type { DecryptionError } from '../types/errors.js';
import type { EncryptedMemoryRow, MemoryMatch, MemoryQueryFilter, MemoryQueryOutcome } from './types.js';

type Decryptor = Pick<CipherService, 'tryDecrypt'>;

interface NormalizedFilter {
  emotion: string | null;
  keyword: string | null;
  match: 'any' | 'all';
}

/**
 * Empty strings count as absent filters.
 */
function normalizeFilter(filter: MemoryQueryFilter): NormalizedFilter {
  return {
    emotion: filter.emotion ? filter.emotion : null,
    keyword: filter.keyword ? filter.keyword.toLowerCase() : null,
    match: filter.match ?? 'any',
  };
}

export function hasQueryFilter(filter: MemoryQueryFilter): boolean {
  const { emotion, keyword } = normalizeFilter(filter);
  return emotion !== null || keyword !== null;
}

/**
 * Test a decrypted memory against the filter.
 * With no filter supplied nothing matches.
 */
export function matchesFilter(
  memory: { tags: readonly string[]; text: string },
  filter: MemoryQueryFilter
): boolean {
  const { emotion, keyword, match } = normalizeFilter(filter);
  const checks: boolean[] = [];

  if (emotion !== null) checks.push(memory.tags.includes(emotion));
  if (keyword !== null) checks.push(memory.text.toLowerCase().includes(keyword));

  if (checks.length === 0) return false;
  return match === 'all' ? checks.every(Boolean) : checks.some(Boolean);
}

function decryptRow(row: EncryptedMemoryRow, cipher: Decryptor): Result<MemoryMatch, DecryptionError> {
  const decrypted = cipher.tryDecrypt(row.encBlob);
  if (!decrypted.ok) return err(decrypted.error);
  return ok({
    id: row.id,
    key: row.key,
    tags: row.tags,
    createdAt: row.createdAt,
    text: decrypted.value,
  });
}

/**
 * Decrypt and filter rows, preserving their order.
 */
export function scanMemories(
  rows: readonly EncryptedMemoryRow[],
  cipher: Decryptor,
  filter: MemoryQueryFilter
): MemoryQueryOutcome {
  if (!hasQueryFilter(filter)) {
    return { results: [], skipped: 0 };
  }

  const { values, errors } = partition(rows.map((row) => decryptRow(row, cipher)));
  return {
    results: values.filter((memory) => matchesFilter(memory, filter)),
    skipped: errors.length,
  };
}
