/**
 * @memvault/core
 *
 * Encrypted memory foundation: AES-256-GCM cipher, key loading, emotion
 * tagging, query matching and the shared service registry.
 * Uses only Node.js built-in modules.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Crypto
export * from './crypto/index.js';

// Encrypted memory records
export * from './memory/index.js';

// Services (ServiceRegistry, interfaces, tokens, logging)
export * from './services/index.js';

// Version
export const VERSION = '0.1.0';
