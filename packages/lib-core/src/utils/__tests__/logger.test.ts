import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  setLoggerConfig,
  getLoggerConfig,
  initLoggerFromEnv,
  DEFAULT_LOGGER_CONFIG,
} from '../logger';

/**
 * Logger Utility Tests
 *
 * - Log level filtering (global and per module)
 * - JSON / pretty output
 * - Child loggers and module tagging
 * - Timer functionality
 */

function spyOnConsole() {
  return {
    log: vi.spyOn(console, 'log').mockImplementation(() => {}),
    warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
    error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    debug: vi.spyOn(console, 'debug').mockImplementation(() => {}),
  };
}

describe('Logger', () => {
  let consoleSpies: ReturnType<typeof spyOnConsole>;
  let consoleLogSpy: ReturnType<typeof spyOnConsole>['log'];
  let consoleWarnSpy: ReturnType<typeof spyOnConsole>['warn'];
  let consoleErrorSpy: ReturnType<typeof spyOnConsole>['error'];
  let consoleDebugSpy: ReturnType<typeof spyOnConsole>['debug'];

  beforeEach(() => {
    setLoggerConfig({ ...DEFAULT_LOGGER_CONFIG });

    consoleSpies = spyOnConsole();
    consoleLogSpy = consoleSpies.log;
    consoleWarnSpy = consoleSpies.warn;
    consoleErrorSpy = consoleSpies.error;
    consoleDebugSpy = consoleSpies.debug;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    setLoggerConfig({ ...DEFAULT_LOGGER_CONFIG });
  });

  describe('createLogger', () => {
    it('should write JSON entries with level and message', () => {
      createLogger().info('Test message');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output.level).toBe('info');
      expect(output.message).toBe('Test message');
      expect(typeof output.timestamp).toBe('string');
    });

    it('should merge base context and extra context', () => {
      const logger = createLogger({ requestId: 'req-123' });
      logger.info('Removing 3 expired grants', { count: 3 });

      const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output.requestId).toBe('req-123');
      expect(output.count).toBe(3);
    });

    it('should not let context override the message', () => {
      createLogger({ message: 'from context' }).info('real message');

      const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output.message).toBe('real message');
    });

    it('should route levels to matching console methods', () => {
      setLoggerConfig({ level: 'debug' });
      const logger = createLogger();

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(consoleDebugSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it('should include error message and stack', () => {
      const err = new Error('boom');
      createLogger().error('Failed', {}, err);

      const output = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
      expect(output.error.message).toBe('boom');
      expect(output.error.stack).toBe(err.stack);
    });
  });

  describe('level filtering', () => {
    it('should drop debug entries at the default info level', () => {
      createLogger().debug('hidden');

      expect(consoleDebugSpy).not.toHaveBeenCalled();
    });

    it('should apply global level changes to existing loggers', () => {
      const logger = createLogger();
      setLoggerConfig({ level: 'error' });

      logger.warn('hidden');
      logger.error('shown');

      expect(consoleWarnSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it('should honour a per-logger level', () => {
      const logger = createLogger({}, { level: 'debug' });
      logger.debug('shown');

      expect(consoleDebugSpy).toHaveBeenCalledTimes(1);
    });

    it('should honour module overrides', () => {
      setLoggerConfig({ level: 'info', moduleOverrides: { 'TOKEN-CLEANUP': { level: 'debug' } } });

      createLogger().module('TOKEN-CLEANUP').debug('shown');
      createLogger().module('OTHER').debug('hidden');

      expect(consoleDebugSpy).toHaveBeenCalledTimes(1);
      const output = JSON.parse(String(consoleDebugSpy.mock.calls[0][0]));
      expect(output.module).toBe('TOKEN-CLEANUP');
    });
  });

  describe('pretty format', () => {
    it('should print a single human-readable line', () => {
      setLoggerConfig({ format: 'pretty' });
      createLogger().module('SQLITE-ADAPTER').info('ready');

      const line = String(consoleLogSpy.mock.calls[0][0]);
      expect(line).toContain('INFO');
      expect(line).toContain('[SQLITE-ADAPTER] ready');
    });
  });

  describe('child and module', () => {
    it('should carry parent context into children', () => {
      const child = createLogger({ requestId: 'run-1' }).child({ action: 'sweep' });
      child.info('x');

      const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output.requestId).toBe('run-1');
      expect(output.action).toBe('sweep');
    });
  });

  describe('startTimer', () => {
    it('should log the elapsed duration', () => {
      vi.useFakeTimers();
      try {
        const done = createLogger().startTimer('Token cleanup');
        vi.advanceTimersByTime(250);
        done();
      } finally {
        vi.useRealTimers();
      }

      const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output.message).toBe('Token cleanup completed');
      expect(output.durationMs).toBe(250);
    });
  });

  describe('initLoggerFromEnv', () => {
    it('should read LOG_LEVEL and LOG_FORMAT', () => {
      initLoggerFromEnv({ LOG_LEVEL: 'warn', LOG_FORMAT: 'pretty' });

      expect(getLoggerConfig()).toEqual({ level: 'warn', format: 'pretty' });
    });

    it('should fall back to defaults for unknown values', () => {
      initLoggerFromEnv({ LOG_LEVEL: 'verbose', LOG_FORMAT: 'xml' });

      expect(getLoggerConfig()).toEqual({ level: 'info', format: 'json' });
    });
  });
});
