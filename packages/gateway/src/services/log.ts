/**
 * Logging Utility, re-exported from @memvault/core
 *
 * Usage:
 *   import { getLog } from '../services/log.js';
 *   const log = getLog('Memories');
 *   log.info('Memory saved', { id: '...' });
 */

export { getLog } from '@memvault/core';
