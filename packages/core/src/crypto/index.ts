/**
 * Crypto module for MemVault
 * Uses only Node.js built-in crypto
 * @packageDocumentation
 */

export { CipherService, decodeKey, KEY_LENGTH } from './cipher-service.js';

export {
  loadCipherKey,
  writeKeyFile,
  type KeySource,
  type KeyLoaderOptions,
  type LoadedKey,
} from './key-loader.js';
