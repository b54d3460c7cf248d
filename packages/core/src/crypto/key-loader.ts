/**
 * Cipher key loading
 *
 * Precedence: environment secret, then key file, then a freshly generated
 * key persisted to the key file. A key that changes orphans every token
 * sealed under the previous one.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { CipherService, decodeKey } from './cipher-service.js';
import { CryptoError } from '../types/errors.js';
import { getLog } from '../services/get-log.js';

const log = getLog('KeyLoader');

export type KeySource = 'env' | 'file' | 'generated';

export interface KeyLoaderOptions {
  /** Encoded key from the environment; wins over the key file */
  envKey?: string;
  /** Path of the persisted key file */
  keyFilePath: string;
}

export interface LoadedKey {
  cipher: CipherService;
  source: KeySource;
}

/**
 * Write a new key file. Refuses to overwrite unless `force` is set.
 * Returns the encoded key that was written.
 */
export async function writeKeyFile(keyFilePath: string, options: { force?: boolean } = {}): Promise<string> {
  const encoded = CipherService.generateKey();
  try {
    await mkdir(dirname(keyFilePath), { recursive: true });
    await writeFile(keyFilePath, `${encoded}\n`, {
      encoding: 'utf-8',
      mode: 0o600,
      flag: options.force ? 'w' : 'wx',
    });
  } catch (error) {
    const exists = error instanceof Error && 'code' in error && error.code === 'EEXIST';
    const message = exists
      ? `key file already exists: ${keyFilePath}`
      : `cannot write key file ${keyFilePath}`;
    throw new CryptoError('generate-key', message, { cause: error });
  }
  return encoded;
}

/**
 * Resolve the process-wide cipher key and build the CipherService around it.
 */
export async function loadCipherKey(options: KeyLoaderOptions): Promise<LoadedKey> {
  if (options.envKey?.trim()) {
    const cipher = new CipherService(decodeKey(options.envKey));
    log.info('Using encryption key from environment');
    return { cipher, source: 'env' };
  }

  if (existsSync(options.keyFilePath)) {
    let contents: string;
    try {
      contents = await readFile(options.keyFilePath, 'utf-8');
    } catch (error) {
      throw new CryptoError('load-key', `cannot read key file ${options.keyFilePath}`, { cause: error });
    }
    const cipher = new CipherService(decodeKey(contents));
    log.info('Loaded encryption key from file', { keyFilePath: options.keyFilePath });
    return { cipher, source: 'file' };
  }

  const encoded = await writeKeyFile(options.keyFilePath);
  log.warn('No encryption key found, generated a new one', { keyFilePath: options.keyFilePath });
  return { cipher: new CipherService(decodeKey(encoded)), source: 'generated' };
}
