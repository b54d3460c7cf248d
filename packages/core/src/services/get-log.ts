/**
 * Logging Utility
 *
 * Scoped loggers for any module. Each call resolves the registered log
 * service at write time, so loggers created at import time pick up the
 * service registered later during startup. Without one (CLI commands,
 * early startup, tests) output goes to the console.
 *
 * Usage:
 *   import { getLog } from '@memvault/core';
 *   const log = getLog('MemoryService');
 *   log.info('Memory saved', { id: '...' });
 */

import { hasServiceRegistry, getServiceRegistry } from './registry.js';
import { Services } from './tokens.js';
import type { ILogService, LogLevel } from './log-service.js';

const scopedLoggers = new Map<string, ILogService>();

const CONSOLE_WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function registeredLogger(module: string): ILogService | null {
  if (!hasServiceRegistry()) return null;
  return getServiceRegistry().tryGet(Services.Log)?.child(module) ?? null;
}

function createScopedLogger(module: string): ILogService {
  const emit = (level: LogLevel, message: string, data: unknown) => {
    const registered = registeredLogger(module);
    if (registered) {
      registered[level](message, data);
      return;
    }
    if (level === 'debug' && process.env.LOG_LEVEL !== 'debug') return;

    const write = CONSOLE_WRITERS[level];
    if (data !== undefined) write(`[${module}]`, message, data);
    else write(`[${module}]`, message);
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
    child: (sub) => getLog(`${module}:${sub}`),
  };
}

/**
 * Get a scoped logger for a module.
 */
export function getLog(module: string): ILogService {
  let logger = scopedLoggers.get(module);
  if (!logger) {
    logger = createScopedLogger(module);
    scopedLoggers.set(module, logger);
  }
  return logger;
}
