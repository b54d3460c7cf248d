/**
 * LogService Implementation
 *
 * Structured logging with two modes:
 * - Development: Human-readable output with module prefix
 * - Production (NODE_ENV=production or LOG_JSON=true): JSON lines
 *
 * Usage:
 *   const log = createLogService({ level: 'info' });
 *   log.info('Server started', { port: 8080 });
 *
 *   const storeLog = log.child('MemoryService');
 *   storeLog.info('Memory saved');
 *   // Dev:  [MemoryService] Memory saved
 *   // Prod: {"level":"info","ts":"...","module":"MemoryService","msg":"Memory saved"}
 */

import type { ILogService, LogLevel } from '@memvault/core';

export interface LogServiceOptions {
  level?: LogLevel;
  json?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

function toJsonFields(data: unknown): Record<string, unknown> {
  if (data === undefined) return {};
  if (data instanceof Error) return { error: data.message, errorName: data.name };
  if (isPlainRecord(data)) return data;
  return { data };
}

export function isJsonLoggingEnabled(env: Record<string, string | undefined> = process.env): boolean {
  return env.LOG_JSON === 'true' || env.NODE_ENV === 'production';
}

export class LogService implements ILogService {
  private readonly level: LogLevel;
  private readonly module: string | null;
  private readonly json: boolean;

  constructor(options?: LogServiceOptions & { module?: string }) {
    this.level = options?.level ?? 'info';
    this.module = options?.module ?? null;
    this.json = options?.json ?? isJsonLoggingEnabled();
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.level,
      json: this.json,
      module: this.module ? `${this.module}:${module}` : module,
    });
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    const write = WRITERS[level];

    if (this.json) {
      write(
        JSON.stringify({
          level,
          ts: new Date().toISOString(),
          ...(this.module ? { module: this.module } : {}),
          msg: message,
          ...toJsonFields(data),
        })
      );
      return;
    }

    const line = this.module ? `[${this.module}] ${message}` : message;
    if (data !== undefined) {
      write(line, data);
    } else {
      write(line);
    }
  }
}

/**
 * Create a new LogService instance.
 */
export function createLogService(options?: LogServiceOptions): ILogService {
  return new LogService(options);
}
