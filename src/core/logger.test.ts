/**
 * Property-based tests for Logger System
 */

import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import {
  type LogLevel,
  type LogEntry,
  LOG_LEVELS,
  LoggerImpl,
  shouldLog,
  createLogger,
  format,
  isLogLevel,
} from './logger.js';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const logLevelArbitrary = fc.constantFrom<LogLevel>(...LOG_LEVELS);

const logMessageArbitrary = fc.string({ minLength: 1, maxLength: 200 });

describe('Logger System Property Tests', () => {
  describe('Log Level Filtering', () => {
    it('should output entries with level >= configured level', () => {
      fc.assert(
        fc.property(logLevelArbitrary, logLevelArbitrary, (configuredLevel, entryLevel) => {
          const expected = LOG_LEVEL_PRIORITY[entryLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
          expect(shouldLog(entryLevel, configuredLevel)).toBe(expected);
        }),
        { numRuns: 100 }
      );
    });

    it('should filter entries through a logger instance after setLevel', () => {
      fc.assert(
        fc.property(logLevelArbitrary, logLevelArbitrary, logMessageArbitrary, (initial, next, message) => {
          const loggedEntries: LogEntry[] = [];
          const logger = new LoggerImpl(initial, (entry) => loggedEntries.push(entry));

          logger.setLevel(next);
          logger.debug(message);
          logger.info(message);
          logger.warn(message);
          logger.error(message);

          const expectedCount = LOG_LEVELS.filter(
            level => LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[next]
          ).length;
          expect(loggedEntries.length).toBe(expectedCount);
          expect(logger.getLevel()).toBe(next);
        }),
        { numRuns: 100 }
      );
    });

    it('should recognise exactly the four level names', () => {
      expect(LOG_LEVELS.every(isLogLevel)).toBe(true);
      expect(isLogLevel('warning')).toBe(false);
      expect(isLogLevel('')).toBe(false);
    });
  });

  describe('Message Interpolation', () => {
    it('should replace positional placeholders with their arguments', () => {
      expect(format('Tried to register command `{0}` which is already registered', 'foo bar'))
        .toBe('Tried to register command `foo bar` which is already registered');
      expect(format('{1} before {0}', 'a', 'b')).toBe('b before a');
    });

    it('should leave placeholders without an argument untouched', () => {
      expect(format('{0} and {1}', 'x')).toBe('x and {1}');
    });

    it('should return templates without placeholders unchanged', () => {
      fc.assert(
        fc.property(
          fc.string().filter(s => !/\{\d+\}/.test(s)),
          fc.array(fc.string(), { maxLength: 3 }),
          (template, args) => {
            expect(format(template, ...args)).toBe(template);
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('Child Loggers', () => {
    it('should stamp bindings onto every entry', () => {
      const loggedEntries: LogEntry[] = [];
      const logger = createLogger('debug', (entry) => loggedEntries.push(entry));
      const child = logger.child({ module: 'economy' });

      child.warn('Replacing', { command: 'pay' });

      expect(loggedEntries).toHaveLength(1);
      expect(loggedEntries[0].context).toEqual({ module: 'economy', command: 'pay' });
    });

    it('should follow level changes made on the parent', () => {
      const loggedEntries: LogEntry[] = [];
      const logger = createLogger('debug', (entry) => loggedEntries.push(entry));
      const child = logger.child({ module: 'economy' });

      logger.setLevel('error');
      child.info('hidden');

      expect(loggedEntries).toHaveLength(0);
      expect(child.getLevel()).toBe('error');
    });
  });

  describe('Output Failures', () => {
    it('should not throw when the output sink throws', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
      const logger = createLogger('debug', () => {
        throw new Error('sink down');
      });

      expect(() => logger.warn('first')).not.toThrow();
      expect(() => logger.warn('second')).not.toThrow();
      expect(consoleError).toHaveBeenCalledTimes(1);

      consoleError.mockRestore();
    });

    it('should fold error details into the context', () => {
      const loggedEntries: LogEntry[] = [];
      const logger = createLogger('error', (entry) => loggedEntries.push(entry));

      logger.error('Handler failed', new Error('boom'), { command: 'pay' });

      expect(loggedEntries[0].context?.errorMessage).toBe('boom');
      expect(loggedEntries[0].context?.command).toBe('pay');
      expect(typeof loggedEntries[0].context?.errorStack).toBe('string');
    });
  });
});
