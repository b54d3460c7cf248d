/**
 * Gateway Default Configuration
 *
 * Named constants for all tunable infrastructure values.
 * Import these instead of using inline magic numbers.
 *
 * Override via environment variables where noted.
 */

// ============================================================================
// HTTP
// ============================================================================

/** Listen port (PORT) */
export const DEFAULT_PORT = 8080;

/** Bind host (HOST) */
export const DEFAULT_HOST = '127.0.0.1';

/** Request body limit in bytes (BODY_SIZE_LIMIT) */
export const DEFAULT_BODY_LIMIT_BYTES = 1024 * 1024; // 1 MB

/** CORS preflight cache lifetime (seconds) */
export const SECONDS_PER_DAY = 86_400;

/** Grace period before a forced exit on shutdown (ms) */
export const SHUTDOWN_TIMEOUT_MS = 10_000;

// ============================================================================
// Database
// ============================================================================

/** Maximum number of connections in the Postgres pool (POSTGRES_POOL_SIZE) */
export const DB_POOL_MAX = 10;

/** Idle connection timeout before closing (ms) */
export const DB_IDLE_TIMEOUT_MS = 30_000;

/** Connection acquisition timeout (ms) */
export const DB_CONNECT_TIMEOUT_MS = 5_000;
