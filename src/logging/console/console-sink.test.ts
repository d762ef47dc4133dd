/**
 * Unit tests for console sink
 */

import { Chalk } from 'chalk';
import { createConsoleSink } from './console-sink';
import type { LogLevels } from '../types';

const LOG_LEVELS: LogLevels = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  CRITICAL: 3
};

const FIXED_DATE = new Date('2024-01-15T08:30:00.000Z');

describe('createConsoleSink', () => {
  let mockConsole: { log: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    mockConsole = {
      log: vi.fn(),
      error: vi.fn()
    };
  });

  function plainSink() {
    return createConsoleSink(mockConsole, {
      logLevels: LOG_LEVELS,
      colors: new Chalk({ level: 0 }),
      clock: () => FIXED_DATE
    });
  }

  describe('write', () => {
    it('should prefix each line with an ISO timestamp', () => {
      const sink = plainSink();

      sink.write('ℹ️ [INFO]     hello', LOG_LEVELS.INFO);

      expect(mockConsole.log).toHaveBeenCalledWith('2024-01-15T08:30:00.000Z ℹ️ [INFO]     hello');
    });

    it('should send DEBUG and INFO to stdout', () => {
      const sink = plainSink();

      sink.write('a', LOG_LEVELS.DEBUG);
      sink.write('b', LOG_LEVELS.INFO);

      expect(mockConsole.log).toHaveBeenCalledTimes(2);
      expect(mockConsole.error).not.toHaveBeenCalled();
    });

    it('should send WARNING and CRITICAL to stderr', () => {
      const sink = plainSink();

      sink.write('w', LOG_LEVELS.WARNING);
      sink.write('c', LOG_LEVELS.CRITICAL);

      expect(mockConsole.error).toHaveBeenNthCalledWith(1, '2024-01-15T08:30:00.000Z w');
      expect(mockConsole.error).toHaveBeenNthCalledWith(2, '2024-01-15T08:30:00.000Z c');
      expect(mockConsole.log).not.toHaveBeenCalled();
    });

    it('should color critical lines when colors are enabled', () => {
      const colors = new Chalk({ level: 1 });
      const sink = createConsoleSink(mockConsole, {
        logLevels: LOG_LEVELS,
        colors: colors,
        clock: () => FIXED_DATE
      });

      sink.write('boom', LOG_LEVELS.CRITICAL);

      expect(mockConsole.error).toHaveBeenCalledWith(
        colors.dim('2024-01-15T08:30:00.000Z') + ' ' + colors.red.bold('boom')
      );
    });

    it('should count written lines', () => {
      const sink = plainSink();

      sink.write('one', LOG_LEVELS.INFO);
      sink.write('two', LOG_LEVELS.WARNING);

      expect(sink.getWrittenCount()).toBe(2);
    });
  });

  describe('initialize', () => {
    it('should report success', () => {
      expect(plainSink().initialize()).toEqual({ success: true, message: 'Console sink initialized' });
    });
  });
});
