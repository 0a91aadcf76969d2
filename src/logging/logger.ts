/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 * The logger routes messages through filters and formatters before writing to sinks.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Auto-demotion of INFO logs after configurable uptime
 * - Multiple output sinks (console, file, Slack)
 * - Runtime level adjustment
 * - Async sink initialization and teardown
 */

import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';
import { formatLogMessage, shouldLog } from './helpers';

/**
 * Create a logger instance
 *
 * The logger coordinates filtering, formatting, and output to multiple sinks.
 * Each message is:
 * 1. Checked against the current log level and auto-demotion rules
 * 2. Formatted with a level-appropriate tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level, demoteHours)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 0 },
 *   {
 *     timeSource: now,
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.INFO },
 *       { sink: slackSink, minLevel: LOG_LEVELS.WARNING }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info("Monitoring started");      // Console only
 * logger.warning("Potential leak detected"); // Console + Slack
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const demoteHours = config.demoteHours;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks || [];
  const fallback = dependencies.fallback || console;
  const startTime = timeSource(); // Uptime for auto-demotion is measured from creation

  /**
   * Internal log function
   * @param level - Log level (0-3)
   * @param msg - Message to log
   */
  function log(level: LogLevel, msg: string): void {
    const context = {
      currentLevel: currentLevel,
      uptime: timeSource() - startTime,
      demoteHours: demoteHours
    };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (const entry of sinks) {
      if (level < entry.minLevel) {
        continue;
      }

      try {
        entry.sink.write(formattedMessage, level);
      } catch (err) {
        // Sink errors should not crash the logger
        fallback.warn('Logger sink error: ' + String(err));
      }
    }
  }

  /**
   * Log DEBUG level message
   * Use for detailed diagnostic information during development
   * @param msg - Message to log
   */
  function debug(msg: string): void {
    log(logLevels.DEBUG, msg);
  }

  /**
   * Log INFO level message
   * Use for general operational information
   * @param msg - Message to log
   */
  function info(msg: string): void {
    log(logLevels.INFO, msg);
  }

  /**
   * Log WARNING level message
   * Use for potentially harmful situations that need attention
   * @param msg - Message to log
   */
  function warning(msg: string): void {
    log(logLevels.WARNING, msg);
  }

  /**
   * Log CRITICAL level message
   * Use for serious errors that may cause system failure
   * @param msg - Message to log
   */
  function critical(msg: string): void {
    log(logLevels.CRITICAL, msg);
  }

  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  /**
   * Initialize all sinks
   *
   * A sink whose initialization rejects is reported as a failed message
   * rather than failing the whole logger.
   */
  async function initialize(): Promise<InitMessage[]> {
    const pending: Promise<InitMessage>[] = [];

    for (const entry of sinks) {
      const sink = entry.sink;
      if (sink.initialize) {
        pending.push(sink.initialize().catch(function(err: unknown): InitMessage {
          return { success: false, message: 'Sink initialization failed: ' + String(err) };
        }));
      }
    }

    return Promise.all(pending);
  }

  /**
   * Close all sinks, reporting (not throwing) individual failures
   */
  async function close(): Promise<void> {
    const results = await Promise.allSettled(
      sinks.map(function(entry) {
        return entry.sink.close ? entry.sink.close() : Promise.resolve();
      })
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        fallback.warn('Logger sink close error: ' + String(result.reason));
      }
    }
  }

  return {
    log: log,
    debug: debug,
    info: info,
    warning: warning,
    critical: critical,
    setLevel: setLevel,
    getLevel: getLevel,
    initialize: initialize,
    close: close
  };
}
