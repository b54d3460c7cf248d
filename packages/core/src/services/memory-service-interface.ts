/**
 * IMemoryService - Encrypted Memory Store Interface
 *
 * Implemented by the gateway MemoryService over a record repository and
 * an injected CipherService. Listing and querying are scoped by owner;
 * download and delete address a single record by id.
 *
 * Usage:
 *   const memories = registry.get(Services.Memory);
 *   const record = await memories.save({ ownerId: 'u1', data: 'I feel so lonely today' });
 */

import type {
  MemoryRecord,
  MemorySummary,
  MemoryQueryFilter,
  MemoryQueryOutcome,
  SaveMemoryInput,
} from '../memory/types.js';

export interface IMemoryService {
  /** Tag, encrypt and persist one memory */
  save(input: SaveMemoryInput): Promise<MemoryRecord>;

  /** Metadata of every record owned by `ownerId`, oldest first */
  list(ownerId: string): Promise<MemorySummary[]>;

  /** Decrypted text of one record. Throws NotFoundError or DecryptionError. */
  download(id: string): Promise<string>;

  /** Hard delete; reports the id whether or not a row existed */
  delete(id: string): Promise<string>;

  /** Emotion/keyword search over the owner's decrypted records */
  query(ownerId: string, filter: MemoryQueryFilter): Promise<MemoryQueryOutcome>;
}
