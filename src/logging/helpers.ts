/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels, FilterContext, TimerAPI } from './types';

/**
 * Format a fill level for log lines
 * @param value - Percentage, null when unavailable
 * @returns e.g. "42.5%" or "n/a"
 */
export function fmtPercent(value: number | null): string {
  if (value === null) return "n/a";
  return value.toFixed(1) + "%";
}

/**
 * Format a voltage for log lines
 * @param value - Volts
 * @returns e.g. "1.234V"
 */
export function fmtVolts(value: number): string {
  return value.toFixed(3) + "V";
}

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = "[DEBUG]    ";
  if (level === logLevels.INFO) tag = "ℹ️ [INFO]     ";
  if (level === logLevels.WARNING) tag = "⚠️ [WARNING]  ";
  if (level === logLevels.CRITICAL) tag = "🚨 [CRITICAL] ";

  return tag + msg;
}

/**
 * Check if message should be logged based on level and auto-demotion
 *
 * Filtering rules:
 * 1. Basic level filtering: message level must be >= current level
 * 2. Auto-demotion: INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptime > context.demoteHours * 3600) {
      return false;
    }
  }

  return true;
}

/**
 * Convert a configured number into a LogLevel
 * @param value - Configured level
 * @param fallback - Level used when value is not 0..3
 */
export function toLogLevel(value: number, fallback: LogLevel): LogLevel {
  switch (value) {
    case 0:
    case 1:
    case 2:
    case 3:
      return value;
    default:
      return fallback;
  }
}

/**
 * Timer API over setTimeout
 *
 * Timers are unref'd so a pending retry never keeps the process alive.
 */
export function createNodeTimerApi(): TimerAPI {
  const handles = new Set<NodeJS.Timeout>();

  return {
    set: function(delayMs: number, callback: () => void): void {
      const handle = setTimeout(function() {
        handles.delete(handle);
        callback();
      }, delayMs);
      handle.unref();
      handles.add(handle);
    },
    clearAll: function(): void {
      handles.forEach(function(handle) {
        clearTimeout(handle);
      });
      handles.clear();
    }
  };
}
