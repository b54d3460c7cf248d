import { describe, it, expect } from 'vitest';
import { randomBytes } from 'node:crypto';
import { CipherService, decodeKey, KEY_LENGTH } from './cipher-service.js';
import { CryptoError, DecryptionError } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const BASE64URL = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_';

function makeCipher(): CipherService {
  return new CipherService(randomBytes(KEY_LENGTH));
}

function replaceCharAt(token: string, index: number): string {
  const current = token.charAt(index);
  const replacement = current === 'A' ? 'B' : 'A';
  return token.slice(0, index) + replacement + token.slice(index + 1);
}

// ---------------------------------------------------------------------------
// Key handling
// ---------------------------------------------------------------------------

describe('decodeKey', () => {
  it('accepts a generated base64url key', () => {
    const encoded = CipherService.generateKey();
    expect(decodeKey(encoded)).toHaveLength(KEY_LENGTH);
  });

  it('accepts standard base64 with padding and surrounding whitespace', () => {
    const raw = randomBytes(KEY_LENGTH);
    expect(decodeKey(`  ${raw.toString('base64')}\n`).equals(raw)).toBe(true);
  });

  it('rejects keys of the wrong length', () => {
    expect(() => decodeKey(randomBytes(16).toString('base64url'))).toThrow(CryptoError);
    expect(() => decodeKey(randomBytes(16).toString('base64url'))).toThrow('key must decode to 32 bytes, got 16');
  });

  it('rejects non-base64 text', () => {
    expect(() => decodeKey('not a key!')).toThrow('key must be base64 or base64url text');
  });
});

describe('CipherService construction', () => {
  it('rejects raw keys that are not 32 bytes', () => {
    expect(() => new CipherService(Buffer.alloc(31))).toThrow(CryptoError);
  });

  it('generates distinct keys', () => {
    expect(CipherService.generateKey()).not.toBe(CipherService.generateKey());
  });

  it('builds from encoded key text', () => {
    const encoded = CipherService.generateKey();
    const a = CipherService.fromEncodedKey(encoded);
    const b = CipherService.fromEncodedKey(encoded);
    expect(b.decrypt(a.encrypt('shared'))).toBe('shared');
  });
});

// ---------------------------------------------------------------------------
// Round trip
// ---------------------------------------------------------------------------

describe('encrypt / decrypt', () => {
  const cipher = makeCipher();

  it.each([
    ['empty string', ''],
    ['ascii', 'I feel so lonely today'],
    ['unicode', 'Grüße aus Köln — 東京 🌧'],
    ['multiline', 'line one\nline two\r\n\ttabbed'],
    ['long text', 'x'.repeat(10_000)],
  ])('round-trips %s', (_label, plaintext) => {
    expect(cipher.decrypt(cipher.encrypt(plaintext))).toBe(plaintext);
  });

  it('produces url-safe tokens that never contain the plaintext', () => {
    const token = cipher.encrypt('secret diary entry');
    expect(token).not.toContain('secret');
    expect([...token].every((ch) => BASE64URL.includes(ch))).toBe(true);
  });

  it('uses a fresh nonce for every token', () => {
    expect(cipher.encrypt('same')).not.toBe(cipher.encrypt('same'));
  });

  it('starts every token with the version byte', () => {
    const raw = Buffer.from(cipher.encrypt('v'), 'base64url');
    expect(raw[0]).toBe(0x01);
    // version + nonce + tag + one byte of ciphertext
    expect(raw.length).toBe(1 + 12 + 16 + 1);
  });
});

// ---------------------------------------------------------------------------
// Failure modes
// ---------------------------------------------------------------------------

describe('decryption failures', () => {
  const cipher = makeCipher();

  it('fails for a token sealed under another key', () => {
    const token = makeCipher().encrypt('other key');
    expect(() => cipher.decrypt(token)).toThrow(DecryptionError);
    const result = cipher.tryDecrypt(token);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('authentication');
  });

  it('fails when any character of the token is changed', () => {
    const token = cipher.encrypt('I am sad but happy');
    for (let i = 0; i < token.length; i++) {
      const tampered = replaceCharAt(token, i);
      const result = cipher.tryDecrypt(tampered);
      expect(result.ok, `position ${i}`).toBe(false);
    }
  });

  it('fails when any byte of the decoded token is flipped', () => {
    const raw = Buffer.from(cipher.encrypt('tamper me'), 'base64url');
    for (let i = 0; i < raw.length; i++) {
      const copy = Buffer.from(raw);
      copy[i] = (copy[i] ?? 0) ^ 0x01;
      expect(() => cipher.decrypt(copy.toString('base64url'))).toThrow(DecryptionError);
    }
  });

  it('reports malformed input', () => {
    for (const token of ['', 'abc', 'not base64 at all!', 'gAAAAABk']) {
      const result = cipher.tryDecrypt(token);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.reason).toBe('malformed');
    }
  });

  it('reports an unknown token version', () => {
    const raw = Buffer.from(cipher.encrypt('versioned'), 'base64url');
    raw[0] = 0x02;
    const result = cipher.tryDecrypt(raw.toString('base64url'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('unsupported-version');
  });

  it('reports truncated tokens as malformed', () => {
    const raw = Buffer.from(cipher.encrypt('short'), 'base64url');
    const result = cipher.tryDecrypt(raw.subarray(0, 20).toString('base64url'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('malformed');
  });
});
