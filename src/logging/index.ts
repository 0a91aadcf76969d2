/**
 * Logging module barrel export
 *
 * Exports all logging functions and types for the leak monitor.
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with chalk colouring (createConsoleSink)
 * - Append-only file sink (createFileSink)
 * - Slack webhook sink with retry buffer (createSlackSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, fmtPercent, fmtVolts, toLogLevel, createNodeTimerApi } from './helpers';
export { createConsoleSink } from './console';
export { createFileSink } from './file';
export { createSlackSink } from './slack';
export { createLogger } from './logger';

// Export types
export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FileSink,
  FileSinkConfig,
  SlackSink,
  SlackSinkConfig,
  FetchFn,
  TimerAPI,
  FilterContext,
  InitMessage
} from './types';
