/**
 * Console output sink
 *
 * Writes each line prefixed with an ISO timestamp. WARNING and CRITICAL
 * lines go to stderr, everything else to stdout, colored per level.
 */

import { isErrorLevel } from '../helpers';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI, LogLevel } from '../types';

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (logLevels, colors, clock)
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, {
 *   logLevels: CONFIG.LOG_LEVELS,
 *   colors: chalk,
 *   clock: () => new Date()
 * });
 * consoleSink.write('ℹ️ [INFO]     Hello world', CONFIG.LOG_LEVELS.INFO);
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig
): ConsoleSink {
  const levels = config.logLevels;
  const colors = config.colors;
  let written = 0;

  function colorize(level: LogLevel, line: string): string {
    if (level === levels.CRITICAL) return colors.red.bold(line);
    if (level === levels.WARNING) return colors.yellow(line);
    if (level === levels.DEBUG) return colors.gray(line);
    return line;
  }

  /**
   * Write formatted message
   * @param formattedMessage - Pre-formatted log message
   * @param level - Level the message was logged at
   */
  function write(formattedMessage: string, level: LogLevel): void {
    const line = colors.dim(config.clock().toISOString()) + ' ' + colorize(level, formattedMessage);
    if (isErrorLevel(level, levels)) {
      consoleApi.error(line);
    } else {
      consoleApi.log(line);
    }
    written++;
  }

  function getWrittenCount(): number {
    return written;
  }

  function initialize() {
    return { success: true, message: 'Console sink initialized' };
  }

  return {
    write: write,
    initialize: initialize,
    getWrittenCount: getWrittenCount
  };
}
