/**
 * Console output sink
 *
 * Writes each line straight to the console, coloured by level with chalk:
 * - DEBUG in gray, INFO unstyled
 * - WARNING in yellow, CRITICAL in bold red
 *
 * WARNING and above go to stderr so they survive `2>` redirects and show up
 * as errors under journald.
 */

import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';

import { formatTimestamp } from '@utils/time';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI, InitMessage, LogLevel } from '../types';

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (colors, timestamps)
 * @param timeSource - Returns current time in seconds, used for the timestamp prefix
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: true, timestamps: true }, now);
 * consoleSink.write("ℹ️ [INFO]     Monitoring started", 1);
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig,
  timeSource: () => number
): ConsoleSink {
  const painter: ChalkInstance = config.colors ? new Chalk() : new Chalk({ level: 0 });

  function paint(level: LogLevel, text: string): string {
    switch (level) {
      case 0:
        return painter.gray(text);
      case 2:
        return painter.yellow(text);
      case 3:
        return painter.red.bold(text);
      default:
        return text;
    }
  }

  /**
   * Write formatted message to the console
   * @param formattedMessage - Pre-formatted log message
   * @param level - Level the message was logged at
   */
  function write(formattedMessage: string, level: LogLevel): void {
    let line = paint(level, formattedMessage);
    if (config.timestamps) {
      line = painter.dim(formatTimestamp(timeSource())) + ' ' + line;
    }

    if (level >= 2) {
      consoleApi.warn(line);
    } else {
      consoleApi.log(line);
    }
  }

  async function initialize(): Promise<InitMessage> {
    return { success: true, message: 'Console sink initialized' };
  }

  return {
    write: write,
    initialize: initialize
  };
}
