/**
 * Unit tests for logger coordinator
 */

import type { Mock } from 'vitest';
import { createLogger } from './logger';
import type { LogLevel, LogLevels, SinkWithLevel } from './types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

function mockSink(minLevel: LogLevel) {
  const write = vi.fn<(formattedMessage: string, level: LogLevel) => void>();
  const entry: SinkWithLevel = { sink: { write: write }, minLevel: minLevel };
  return { entry: entry, write: write };
}

describe('createLogger', () => {
  let mockTimeSource: Mock<() => number>;

  beforeEach(() => {
    mockTimeSource = vi.fn(() => 100);
  });

  describe('log level methods', () => {
    it('should log debug messages when level is DEBUG', () => {
      const sink = mockSink(LOG_LEVELS.DEBUG);
      const logger = createLogger(
        { level: LOG_LEVELS.DEBUG, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      logger.debug('test debug');

      expect(sink.write).toHaveBeenCalledWith('[DEBUG]    test debug', LOG_LEVELS.DEBUG);
    });

    it('should log info messages when level is INFO', () => {
      const sink = mockSink(LOG_LEVELS.INFO);
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      logger.info('test info');

      expect(sink.write).toHaveBeenCalledWith('ℹ️ [INFO]     test info', LOG_LEVELS.INFO);
    });

    it('should log warning messages', () => {
      const sink = mockSink(LOG_LEVELS.WARNING);
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      logger.warning('test warning');

      expect(sink.write).toHaveBeenCalledWith('⚠️ [WARNING]  test warning', LOG_LEVELS.WARNING);
    });

    it('should log critical messages', () => {
      const sink = mockSink(LOG_LEVELS.CRITICAL);
      const logger = createLogger(
        { level: LOG_LEVELS.CRITICAL, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      logger.critical('test critical');

      expect(sink.write).toHaveBeenCalledWith('🚨 [CRITICAL] test critical', LOG_LEVELS.CRITICAL);
    });

    it('should log via generic log method', () => {
      const sink = mockSink(LOG_LEVELS.INFO);
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      logger.log(LOG_LEVELS.WARNING, 'generic log');

      expect(sink.write).toHaveBeenCalledWith('⚠️ [WARNING]  generic log', LOG_LEVELS.WARNING);
    });
  });

  describe('level filtering', () => {
    it('should not log debug when level is INFO', () => {
      const sink = mockSink(LOG_LEVELS.DEBUG);
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      logger.debug('should not appear');

      expect(sink.write).not.toHaveBeenCalled();
    });

    it('should not log info when level is WARNING', () => {
      const sink = mockSink(LOG_LEVELS.DEBUG);
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      logger.info('should not appear');

      expect(sink.write).not.toHaveBeenCalled();
    });
  });

  describe('auto-demotion', () => {
    it('should demote INFO after demoteHours of uptime', () => {
      const sink = mockSink(LOG_LEVELS.INFO);
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 24 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      logger.info('still visible');
      mockTimeSource.mockReturnValue(100 + 25 * 3600);
      logger.info('should be demoted');

      expect(sink.write).toHaveBeenCalledTimes(1);
      expect(sink.write).toHaveBeenCalledWith('ℹ️ [INFO]     still visible', LOG_LEVELS.INFO);
    });

    it('should not demote WARNING after demoteHours', () => {
      const sink = mockSink(LOG_LEVELS.INFO);
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 24 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      mockTimeSource.mockReturnValue(100 + 25 * 3600);
      logger.warning('should not be demoted');

      expect(sink.write).toHaveBeenCalledTimes(1);
    });
  });

  describe('setLevel and getLevel', () => {
    it('should return initial level', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [] },
        LOG_LEVELS
      );

      expect(logger.getLevel()).toBe(LOG_LEVELS.WARNING);
    });

    it('should filter based on new level after setLevel', () => {
      const sink = mockSink(LOG_LEVELS.INFO);
      const logger = createLogger(
        { level: LOG_LEVELS.WARNING, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      logger.info('before setLevel');
      expect(sink.write).not.toHaveBeenCalled();

      logger.setLevel(LOG_LEVELS.INFO);
      expect(logger.getLevel()).toBe(LOG_LEVELS.INFO);

      logger.info('after setLevel');
      expect(sink.write).toHaveBeenCalledWith('ℹ️ [INFO]     after setLevel', LOG_LEVELS.INFO);
    });
  });

  describe('multiple sinks', () => {
    it('should continue to other sinks if one throws', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const failing: SinkWithLevel = {
        sink: {
          write: () => {
            throw new Error('Sink error');
          }
        },
        minLevel: LOG_LEVELS.INFO
      };
      const healthy = mockSink(LOG_LEVELS.INFO);

      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [failing, healthy.entry] },
        LOG_LEVELS
      );

      logger.info('test message');

      expect(healthy.write).toHaveBeenCalledTimes(1);
      expect(consoleSpy).toHaveBeenCalledWith('Logger sink error: Error: Sink error');

      consoleSpy.mockRestore();
    });

    it('should handle empty sinks array', () => {
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [] },
        LOG_LEVELS
      );

      expect(() => logger.info('test')).not.toThrow();
    });

    it('should filter by per-sink minLevel', () => {
      const verbose = mockSink(LOG_LEVELS.INFO);
      const alerts = mockSink(LOG_LEVELS.WARNING);

      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [verbose.entry, alerts.entry] },
        LOG_LEVELS
      );

      logger.info('test info');
      expect(verbose.write).toHaveBeenCalledTimes(1);
      expect(alerts.write).not.toHaveBeenCalled();

      logger.warning('test warning');
      expect(verbose.write).toHaveBeenCalledTimes(2);
      expect(alerts.write).toHaveBeenCalledTimes(1);
    });
  });

  describe('initialize', () => {
    it('should collect messages from sinks that have an initializer', () => {
      const plain = mockSink(LOG_LEVELS.INFO);
      const initialize = vi.fn(() => ({ success: true, message: 'Sink 2 ready' }));
      const withInit: SinkWithLevel = {
        sink: { write: vi.fn(), initialize: initialize },
        minLevel: LOG_LEVELS.INFO
      };

      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [plain.entry, withInit] },
        LOG_LEVELS
      );

      expect(logger.initialize()).toEqual([{ success: true, message: 'Sink 2 ready' }]);
      expect(initialize).toHaveBeenCalledTimes(1);
    });

    it('should return no messages when no sink needs initialization', () => {
      const sink = mockSink(LOG_LEVELS.INFO);
      const logger = createLogger(
        { level: LOG_LEVELS.INFO, demoteHours: 0 },
        { timeSource: mockTimeSource, sinks: [sink.entry] },
        LOG_LEVELS
      );

      expect(logger.initialize()).toEqual([]);
    });
  });
});
