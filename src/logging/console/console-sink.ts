/**
 * Console output sink
 *
 * Routes DEBUG and INFO lines to console.log and WARNING and CRITICAL lines
 * to console.warn (stderr), optionally coloured by level.
 */

import chalk from 'chalk';

import type { ConsoleAPI, ConsoleSinkConfig, LogLevel, LogLevels, LogSink } from '../types';

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (colors)
 * @param logLevels - Log level constants object
 * @returns Sink writing each line immediately
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: true }, LOG_LEVELS);
 * consoleSink.write("[DEBUG]    hello", LOG_LEVELS.DEBUG);
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig,
  logLevels: LogLevels
): LogSink {
  function paint(line: string, level: LogLevel): string {
    if (!config.colors) return line;
    if (level === logLevels.DEBUG) return chalk.gray(line);
    if (level === logLevels.WARNING) return chalk.yellow(line);
    if (level === logLevels.CRITICAL) return chalk.red(line);
    return line;
  }

  function write(formattedMessage: string, level: LogLevel): void {
    const line = paint(formattedMessage, level);
    if (level >= logLevels.WARNING) {
      consoleApi.warn(line);
    } else {
      consoleApi.log(line);
    }
  }

  return { write: write };
}
