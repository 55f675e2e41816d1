/**
 * Unit tests for logger coordinator
 */

import { createLogger } from './logger';
import type { LogLevels, LogSink, SinkWithLevel } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

function createMockSink(minLevel: SinkWithLevel['minLevel']) {
  const write = vi.fn<LogSink['write']>();
  return { entry: { sink: { write: write }, minLevel: minLevel }, write: write };
}

describe('createLogger', () => {
  describe('log level methods', () => {
    test('should log debug messages when level is DEBUG', () => {
      const mock = createMockSink(LOG_LEVELS.DEBUG);
      const logger = createLogger({ level: LOG_LEVELS.DEBUG }, { sinks: [mock.entry] }, LOG_LEVELS);

      logger.debug('test debug');

      expect(mock.write).toHaveBeenCalledWith('[DEBUG]    test debug', LOG_LEVELS.DEBUG);
    });

    test('should log info messages when level is INFO', () => {
      const mock = createMockSink(LOG_LEVELS.INFO);
      const logger = createLogger({ level: LOG_LEVELS.INFO }, { sinks: [mock.entry] }, LOG_LEVELS);

      logger.info('test info');

      expect(mock.write).toHaveBeenCalledWith('ℹ️ [INFO]     test info', LOG_LEVELS.INFO);
    });

    test('should log warning messages', () => {
      const mock = createMockSink(LOG_LEVELS.WARNING);
      const logger = createLogger({ level: LOG_LEVELS.WARNING }, { sinks: [mock.entry] }, LOG_LEVELS);

      logger.warning('test warning');

      expect(mock.write).toHaveBeenCalledWith('⚠️ [WARNING]  test warning', LOG_LEVELS.WARNING);
    });

    test('should log critical messages', () => {
      const mock = createMockSink(LOG_LEVELS.CRITICAL);
      const logger = createLogger({ level: LOG_LEVELS.CRITICAL }, { sinks: [mock.entry] }, LOG_LEVELS);

      logger.critical('test critical');

      expect(mock.write).toHaveBeenCalledWith('🚨 [CRITICAL] test critical', LOG_LEVELS.CRITICAL);
    });

    test('should log via generic log method', () => {
      const mock = createMockSink(LOG_LEVELS.INFO);
      const logger = createLogger({ level: LOG_LEVELS.INFO }, { sinks: [mock.entry] }, LOG_LEVELS);

      logger.log(LOG_LEVELS.WARNING, 'generic log');

      expect(mock.write).toHaveBeenCalledWith('⚠️ [WARNING]  generic log', LOG_LEVELS.WARNING);
    });
  });

  describe('level filtering', () => {
    test('should not log debug when level is INFO', () => {
      const mock = createMockSink(LOG_LEVELS.DEBUG);
      const logger = createLogger({ level: LOG_LEVELS.INFO }, { sinks: [mock.entry] }, LOG_LEVELS);

      logger.debug('should not appear');

      expect(mock.write).not.toHaveBeenCalled();
    });

    test('should not log info when level is WARNING', () => {
      const mock = createMockSink(LOG_LEVELS.DEBUG);
      const logger = createLogger({ level: LOG_LEVELS.WARNING }, { sinks: [mock.entry] }, LOG_LEVELS);

      logger.info('should not appear');

      expect(mock.write).not.toHaveBeenCalled();
    });
  });

  describe('sink routing', () => {
    test('should only write to sinks whose minimum level is met', () => {
      const all = createMockSink(LOG_LEVELS.DEBUG);
      const alertsOnly = createMockSink(LOG_LEVELS.WARNING);
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG },
        { sinks: [all.entry, alertsOnly.entry] },
        LOG_LEVELS
      );

      logger.info('routine');
      logger.warning('attention');

      expect(all.write).toHaveBeenCalledTimes(2);
      expect(alertsOnly.write).toHaveBeenCalledTimes(1);
      expect(alertsOnly.write).toHaveBeenCalledWith('⚠️ [WARNING]  attention', LOG_LEVELS.WARNING);
    });

    test('should keep writing to other sinks when one throws', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const failing = createMockSink(LOG_LEVELS.DEBUG);
      failing.write.mockImplementation(() => {
        throw new Error('disk full');
      });
      const healthy = createMockSink(LOG_LEVELS.DEBUG);
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG },
        { sinks: [failing.entry, healthy.entry] },
        LOG_LEVELS
      );

      logger.info('still delivered');

      expect(healthy.write).toHaveBeenCalledWith('ℹ️ [INFO]     still delivered', LOG_LEVELS.INFO);
      expect(warnSpy).toHaveBeenCalledWith('Logger sink error: Error: disk full');
    });

    test('should accept an empty sink list', () => {
      const logger = createLogger({ level: LOG_LEVELS.DEBUG }, { sinks: [] }, LOG_LEVELS);
      expect(() => logger.critical('nowhere')).not.toThrow();
    });
  });

  describe('runtime level changes', () => {
    test('should report the configured level', () => {
      const logger = createLogger({ level: LOG_LEVELS.WARNING }, { sinks: [] }, LOG_LEVELS);
      expect(logger.getLevel()).toBe(LOG_LEVELS.WARNING);
    });

    test('should apply a new level to later messages', () => {
      const mock = createMockSink(LOG_LEVELS.DEBUG);
      const logger = createLogger({ level: LOG_LEVELS.WARNING }, { sinks: [mock.entry] }, LOG_LEVELS);

      logger.debug('hidden');
      logger.setLevel(LOG_LEVELS.DEBUG);
      logger.debug('visible');

      expect(logger.getLevel()).toBe(LOG_LEVELS.DEBUG);
      expect(mock.write).toHaveBeenCalledTimes(1);
      expect(mock.write).toHaveBeenCalledWith('[DEBUG]    visible', LOG_LEVELS.DEBUG);
    });
  });
});
