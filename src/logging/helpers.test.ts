/**
 * Unit tests for logging helper functions
 */

import { Chalk } from 'chalk';

import { colorizeLogLine, formatLogMessage, shouldLog } from './helpers';
import type { LogLevels } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

describe('formatLogMessage', () => {
  describe('level formatting', () => {
    test('should format DEBUG level with correct tag', () => {
      const result = formatLogMessage(LOG_LEVELS.DEBUG, 'test message', LOG_LEVELS);
      expect(result).toBe('[DEBUG]    test message');
    });

    test('should format INFO level with emoji and correct tag', () => {
      const result = formatLogMessage(LOG_LEVELS.INFO, 'test message', LOG_LEVELS);
      expect(result).toBe('ℹ️ [INFO]     test message');
    });

    test('should format WARNING level with emoji and correct tag', () => {
      const result = formatLogMessage(LOG_LEVELS.WARNING, 'test message', LOG_LEVELS);
      expect(result).toBe('⚠️ [WARNING]  test message');
    });

    test('should format CRITICAL level with emoji and correct tag', () => {
      const result = formatLogMessage(LOG_LEVELS.CRITICAL, 'test message', LOG_LEVELS);
      expect(result).toBe('🚨 [CRITICAL] test message');
    });
  });

  describe('message content', () => {
    test('should preserve message content exactly', () => {
      const msg = 'Frame 12: 24.50°C, 61.00% -> MTMH';
      expect(formatLogMessage(LOG_LEVELS.INFO, msg, LOG_LEVELS)).toBe('ℹ️ [INFO]     ' + msg);
    });

    test('should handle empty message', () => {
      expect(formatLogMessage(LOG_LEVELS.DEBUG, '', LOG_LEVELS)).toBe('[DEBUG]    ');
    });
  });
});

describe('shouldLog', () => {
  test('should log when level equals current log level', () => {
    expect(shouldLog(LOG_LEVELS.INFO, LOG_LEVELS.INFO)).toBe(true);
  });

  test('should not log when level below current log level', () => {
    expect(shouldLog(LOG_LEVELS.DEBUG, LOG_LEVELS.INFO)).toBe(false);
  });

  test('should log when level above current log level', () => {
    expect(shouldLog(LOG_LEVELS.CRITICAL, LOG_LEVELS.WARNING)).toBe(true);
  });
});

describe('colorizeLogLine', () => {
  const painter = new Chalk({ level: 1 });

  test('should colour CRITICAL lines red', () => {
    const line = formatLogMessage(LOG_LEVELS.CRITICAL, 'checksum mismatch', LOG_LEVELS);
    expect(colorizeLogLine(line, painter)).toBe('\u001b[31m' + line + '\u001b[39m');
  });

  test('should colour WARNING lines yellow', () => {
    const line = formatLogMessage(LOG_LEVELS.WARNING, 'wide window', LOG_LEVELS);
    expect(colorizeLogLine(line, painter)).toBe('\u001b[33m' + line + '\u001b[39m');
  });

  test('should dim DEBUG lines', () => {
    const line = formatLogMessage(LOG_LEVELS.DEBUG, 'stats', LOG_LEVELS);
    expect(colorizeLogLine(line, painter)).toBe('\u001b[90m' + line + '\u001b[39m');
  });

  test('should leave INFO lines unchanged', () => {
    const line = formatLogMessage(LOG_LEVELS.INFO, 'done', LOG_LEVELS);
    expect(colorizeLogLine(line, painter)).toBe(line);
  });

  test('should not colour anything when the painter has no colour support', () => {
    const line = formatLogMessage(LOG_LEVELS.CRITICAL, 'x', LOG_LEVELS);
    expect(colorizeLogLine(line, new Chalk({ level: 0 }))).toBe(line);
  });
});
