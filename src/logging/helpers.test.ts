/**
 * Unit tests for logging helper functions
 */

import { formatLogMessage, shouldLog, parseLogLevel, fmtMinutes, fmtReading } from './helpers';
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
    test('should handle empty message', () => {
      const result = formatLogMessage(LOG_LEVELS.INFO, '', LOG_LEVELS);
      expect(result).toBe('ℹ️ [INFO]     ');
    });

    test('should preserve message content exactly', () => {
      const msg = 'Watering: 49.3 min (soil 25.0%, temp 35.0C)';
      const result = formatLogMessage(LOG_LEVELS.DEBUG, msg, LOG_LEVELS);
      expect(result).toBe('[DEBUG]    ' + msg);
    });
  });
});

describe('shouldLog', () => {
  test('should log message at current level', () => {
    expect(shouldLog(LOG_LEVELS.INFO, LOG_LEVELS.INFO)).toBe(true);
  });

  test('should log message above current level', () => {
    expect(shouldLog(LOG_LEVELS.CRITICAL, LOG_LEVELS.WARNING)).toBe(true);
  });

  test('should suppress message below current level', () => {
    expect(shouldLog(LOG_LEVELS.DEBUG, LOG_LEVELS.INFO)).toBe(false);
  });
});

describe('parseLogLevel', () => {
  test('should resolve upper-case names', () => {
    expect(parseLogLevel('WARNING', LOG_LEVELS)).toBe(2);
  });

  test('should be case-insensitive and trim whitespace', () => {
    expect(parseLogLevel('  debug ', LOG_LEVELS)).toBe(0);
  });

  test('should return null for unknown names', () => {
    expect(parseLogLevel('VERBOSE', LOG_LEVELS)).toBeNull();
  });

  test('should not resolve inherited object keys', () => {
    expect(parseLogLevel('toString', LOG_LEVELS)).toBeNull();
  });
});

describe('fmtMinutes', () => {
  test('should format with one decimal', () => {
    expect(fmtMinutes(49.27)).toBe('49.3 min');
  });

  test('should format zero', () => {
    expect(fmtMinutes(0)).toBe('0.0 min');
  });
});

describe('fmtReading', () => {
  test('should append unit', () => {
    expect(fmtReading(25, '%')).toBe('25.0%');
    expect(fmtReading(35.25, 'C')).toBe('35.3C');
  });
});
