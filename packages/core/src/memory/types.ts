/**
 * Encrypted memory store type definitions
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Emotion tags derived from memory text
 */
export type Emotion = 'sad' | 'happy' | 'angry';

/**
 * Schema version stamped on every record
 */
export const MEMORY_RECORD_VERSION = 1;

/**
 * Persisted memory record. `encBlob` is a CipherService token.
 */
export interface MemoryRecord {
  id: string;
  ownerId: string;
  /** Caller-supplied label, empty when omitted */
  key: string;
  /** Caller tags plus the derived emotion tag, deduplicated */
  tags: string[];
  /** ISO-8601 UTC, `Z` suffixed */
  createdAt: string;
  updatedAt: string;
  encBlob: string;
  /** MEMORY_RECORD_VERSION when written */
  version: number;
}

/**
 * Record without ciphertext, as returned by listings
 */
export type MemorySummary = Omit<MemoryRecord, 'encBlob'>;

/**
 * Ciphertext row loaded for a query scan
 */
export type EncryptedMemoryRow = Pick<MemoryRecord, 'id' | 'key' | 'tags' | 'createdAt' | 'encBlob'>;

/**
 * Decrypted query hit
 */
export interface MemoryMatch {
  id: string;
  key: string;
  tags: string[];
  createdAt: string;
  text: string;
}

export interface SaveMemoryInput {
  ownerId: string;
  key?: string;
  tags?: string[];
  /** Plaintext; encrypted before it reaches storage */
  data: string;
}

/**
 * How emotion and keyword filters combine.
 * `any` matches when either supplied filter matches; `all` needs every supplied filter.
 */
export type MatchMode = 'any' | 'all';

export interface MemoryQueryFilter {
  emotion?: string;
  keyword?: string;
  match?: MatchMode;
}

export interface MemoryQueryOutcome {
  results: MemoryMatch[];
  /** Rows dropped because they could not be decrypted */
  skipped: number;
}
