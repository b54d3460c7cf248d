/**
 * getLog() Tests
 *
 * Covers the console fallback, delegation to a registered log service,
 * and caching of scoped loggers.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getLog } from './get-log.js';
import { initServiceRegistry, resetServiceRegistry } from './registry.js';
import { Services } from './tokens.js';
import type { ILogService } from './log-service.js';

function createRecordingLogService(records: string[], module = ''): ILogService {
  const record = (level: string) => (message: string) => {
    records.push(`${level}|${module}|${message}`);
  };
  return {
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: (sub) => createRecordingLogService(records, module ? `${module}:${sub}` : sub),
  };
}

describe('getLog()', () => {
  beforeEach(async () => {
    await resetServiceRegistry();
    delete process.env.LOG_LEVEL;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await resetServiceRegistry();
  });

  // ========================================================================
  // Console fallback (no registered log service)
  // ========================================================================

  describe('console fallback', () => {
    it('info logs to console.log with module prefix', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      getLog('InfoMod').info('hello');
      expect(spy).toHaveBeenCalledWith('[InfoMod]', 'hello');
    });

    it('warn and error use their console methods', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const log = getLog('Mixed');
      log.warn('caution');
      log.error('failure', { code: 1 });
      expect(warn).toHaveBeenCalledWith('[Mixed]', 'caution');
      expect(error).toHaveBeenCalledWith('[Mixed]', 'failure', { code: 1 });
    });

    it('suppresses debug unless LOG_LEVEL is debug', () => {
      const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
      const log = getLog('DebugMod');
      log.debug('hidden');
      expect(spy).not.toHaveBeenCalled();

      process.env.LOG_LEVEL = 'debug';
      log.debug('shown');
      expect(spy).toHaveBeenCalledWith('[DebugMod]', 'shown');
    });

    it('child() extends the module prefix', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      getLog('Parent').child('Sub').info('child message');
      expect(spy).toHaveBeenCalledWith('[Parent:Sub]', 'child message');
    });

    it('caches loggers by module name', () => {
      expect(getLog('CachedMod')).toBe(getLog('CachedMod'));
      expect(getLog('ModA')).not.toBe(getLog('ModB'));
    });
  });

  // ========================================================================
  // Registered log service
  // ========================================================================

  describe('registered log service', () => {
    it('delegates to the registered service scoped by module', () => {
      const records: string[] = [];
      initServiceRegistry().register(Services.Log, createRecordingLogService(records));

      getLog('Store').info('saved');
      expect(records).toEqual(['info|Store|saved']);
    });

    it('applies to loggers created before registration', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      const early = getLog('Early');
      const records: string[] = [];
      initServiceRegistry().register(Services.Log, createRecordingLogService(records));

      early.warn('late write');
      expect(records).toEqual(['warn|Early|late write']);
      expect(spy).not.toHaveBeenCalled();
    });

    it('falls back to console when the registry has no log service', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      initServiceRegistry();
      getLog('NoService').info('still logged');
      expect(spy).toHaveBeenCalledWith('[NoService]', 'still logged');
    });
  });
});
