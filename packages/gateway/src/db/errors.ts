/**
 * Database error classification
 */

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'EAI_AGAIN',
]);

/** admin_shutdown, crash_shutdown, cannot_connect_now */
const SHUTDOWN_SQLSTATES = new Set(['57P01', '57P02', '57P03']);

const POOL_FAILURE_MESSAGES = [
  'timeout exceeded when trying to connect',
  'Connection terminated',
  'Cannot use a pool after calling end on the pool',
];

function errorCode(error: object): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * True when the error means the database cannot be reached, as opposed to
 * a bad statement or constraint violation.
 */
export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const code = errorCode(error);
  if (code) {
    // SQLSTATE class 08: connection exception
    if (NETWORK_ERROR_CODES.has(code) || SHUTDOWN_SQLSTATES.has(code) || code.startsWith('08')) {
      return true;
    }
  }

  return POOL_FAILURE_MESSAGES.some((fragment) => error.message.includes(fragment));
}
