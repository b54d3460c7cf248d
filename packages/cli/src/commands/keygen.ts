/**
 * Keygen command - writes a fresh cipher key file
 */

import { CryptoError, writeKeyFile } from '@memvault/core';
import { getKeyFilePath } from '@memvault/gateway';

export interface KeygenOptions {
  out?: string;
  force?: boolean;
}

export async function keygen(options: KeygenOptions): Promise<void> {
  const keyFilePath = options.out ?? getKeyFilePath();

  try {
    await writeKeyFile(keyFilePath, { force: options.force });
  } catch (err) {
    if (err instanceof CryptoError) {
      console.error(`❌ ${err.message}`);
      if (!options.force) {
        console.error('   Pass --force to replace it. Memories sealed under the old key become unreadable.');
      }
      process.exit(1);
      return;
    }
    throw err;
  }

  console.log(`✅ Wrote new key to ${keyFilePath}`);
  if (options.force) {
    console.log('   Memories saved under the previous key can no longer be decrypted.');
  }
}
