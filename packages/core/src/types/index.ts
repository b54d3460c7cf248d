/**
 * Core types for MemVault
 * @packageDocumentation
 */

// Result pattern
export { type Result, ok, err, unwrap, partition } from './result.js';

// Error classes
export {
  AppError,
  ValidationError,
  NotFoundError,
  AuthenticationError,
  CryptoError,
  DecryptionError,
  StoreUnavailableError,
  isAppError,
} from './errors.js';
