/**
 * ILogService - Structured Logging Interface
 *
 * Usage:
 *   const log = registry.get(Services.Log);
 *   log.info('Server started', { port: 8080 });
 *
 *   // Scoped logger for a module
 *   const storeLog = log.child('MemoryService');
 *   storeLog.info('Memory saved', { id: '...' });
 *   // Output: [MemoryService] Memory saved { id: '...' }
 */

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Create a child logger scoped to a module.
   * The module name is prepended to all log messages.
   */
  child(module: string): ILogService;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
