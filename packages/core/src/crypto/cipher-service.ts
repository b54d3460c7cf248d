/**
 * CipherService - authenticated encryption for memory text at rest
 *
 * - AES-256-GCM with a fresh 96-bit nonce per token
 * - Self-describing token: base64url(version || nonce || authTag || ciphertext)
 * - Tamper detection via the GCM authentication tag
 */

import { randomBytes, createCipheriv, createDecipheriv } from 'node:crypto';
import { type Result, ok, err, unwrap } from '../types/result.js';
import { CryptoError, DecryptionError } from '../types/errors.js';

const ALGORITHM = 'aes-256-gcm';
export const KEY_LENGTH = 32;
const NONCE_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const TOKEN_VERSION = 0x01;
const HEADER_LENGTH = 1 + NONCE_LENGTH + AUTH_TAG_LENGTH;

/**
 * Decode key text (base64 or base64url) into raw key bytes.
 * Throws CryptoError unless the text resolves to exactly 32 bytes.
 */
export function decodeKey(encoded: string): Buffer {
  const trimmed = encoded.trim();
  if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(trimmed)) {
    throw new CryptoError('load-key', 'key must be base64 or base64url text');
  }
  const key = Buffer.from(trimmed, 'base64');
  if (key.length !== KEY_LENGTH) {
    throw new CryptoError('load-key', `key must decode to ${KEY_LENGTH} bytes, got ${key.length}`);
  }
  return key;
}

export class CipherService {
  private readonly key: Buffer;

  constructor(key: Buffer) {
    if (key.length !== KEY_LENGTH) {
      throw new CryptoError('load-key', `key must be ${KEY_LENGTH} bytes, got ${key.length}`);
    }
    this.key = Buffer.from(key);
  }

  /**
   * Build a service from encoded key text
   */
  static fromEncodedKey(encoded: string): CipherService {
    return new CipherService(decodeKey(encoded));
  }

  /**
   * Generate a new random key as base64url text
   */
  static generateKey(): string {
    return randomBytes(KEY_LENGTH).toString('base64url');
  }

  encrypt(plaintext: string): string {
    try {
      const nonce = randomBytes(NONCE_LENGTH);
      const cipher = createCipheriv(ALGORITHM, this.key, nonce, { authTagLength: AUTH_TAG_LENGTH });
      const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
      const tag = cipher.getAuthTag();

      return Buffer.concat([Buffer.from([TOKEN_VERSION]), nonce, tag, ciphertext]).toString('base64url');
    } catch (error) {
      throw new CryptoError('encrypt', error instanceof Error ? error.message : String(error), { cause: error });
    }
  }

  /**
   * Decrypt a token, throwing DecryptionError on any failure
   */
  decrypt(token: string): string {
    return unwrap(this.tryDecrypt(token));
  }

  /**
   * Decrypt a token without throwing. Used by scans that skip unreadable rows.
   */
  tryDecrypt(token: string): Result<string, DecryptionError> {
    const raw = Buffer.from(token, 'base64url');

    // Buffer decoding ignores stray characters; only the canonical encoding is accepted
    if (raw.toString('base64url') !== token || raw.length < HEADER_LENGTH) {
      return err(new DecryptionError('malformed'));
    }
    if (raw[0] !== TOKEN_VERSION) {
      return err(new DecryptionError('unsupported-version'));
    }

    const nonce = raw.subarray(1, 1 + NONCE_LENGTH);
    const tag = raw.subarray(1 + NONCE_LENGTH, HEADER_LENGTH);
    const ciphertext = raw.subarray(HEADER_LENGTH);

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, nonce, { authTagLength: AUTH_TAG_LENGTH });
      decipher.setAuthTag(tag);
      const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
      return ok(plaintext.toString('utf8'));
    } catch (error) {
      return err(new DecryptionError('authentication', { cause: error }));
    }
  }
}
