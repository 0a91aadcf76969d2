/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, file, slack)
 * - Filter context
 * - Initialization messages
 */

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// Core log level type definitions
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches CONFIG.LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// Core logger interface and configuration
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  /** Log DEBUG level message */
  debug(msg: string): void;
  /** Log INFO level message */
  info(msg: string): void;
  /** Log WARNING level message */
  warning(msg: string): void;
  /** Log CRITICAL level message */
  critical(msg: string): void;
  /** Update log level at runtime */
  setLevel(newLevel: LogLevel): void;
  /** Get current log level */
  getLevel(): LogLevel;
  /** Initialize all sinks, resolving with one message per sink that needed it */
  initialize(): Promise<InitMessage[]>;
  /** Flush and release all sinks */
  close(): Promise<void>;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
  /** Hours after which to auto-demote INFO logs (0 to disable) */
  demoteHours: number;
}

/**
 * Sink with its minimum log level
 * Logger filters messages before sending to each sink
 */
export interface SinkWithLevel {
  /** The output sink */
  sink: LogSink;
  /** Minimum level this sink receives */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current time in seconds */
  timeSource: () => number;
  /** Array of sinks with their minimum levels */
  sinks: SinkWithLevel[];
  /** Where sink failures are reported (defaults to the global console) */
  fallback?: ConsoleAPI;
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// Output sink interfaces for console, file and Slack
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in logger before write() is called; the level
 * is passed along for sinks that style by severity
 */
export interface LogSink {
  /** Write formatted message to sink (already filtered by level) */
  write(formattedMessage: string, level: LogLevel): void;
  /** Optional initialization (e.g., open file, check webhook) */
  initialize?(): Promise<InitMessage>;
  /** Optional flush/teardown */
  close?(): Promise<void>;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  /** Log message to console */
  log(message: string): void;
  /** Log warning to console */
  warn(message: string): void;
}

/**
 * Console sink interface
 */
export interface ConsoleSink extends LogSink {
  initialize(): Promise<InitMessage>;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Colour lines by level */
  colors: boolean;
  /** Prefix lines with a local timestamp */
  timestamps: boolean;
}

/**
 * File sink interface
 */
export interface FileSink extends LogSink {
  initialize(): Promise<InitMessage>;
  close(): Promise<void>;
  /** Resolves once every queued line has been appended */
  flush(): Promise<void>;
}

/**
 * File sink configuration
 */
export interface FileSinkConfig {
  /** Path of the log file (appended to, created if missing) */
  path: string;
}

/**
 * Slack sink interface
 * Buffers messages and retries with exponential backoff
 */
export interface SlackSink extends LogSink {
  initialize(): Promise<InitMessage>;
  close(): Promise<void>;
  /** Check if sink is initialized */
  isInitialized(): boolean;
  /** Get current buffer size (for testing/monitoring) */
  getBufferSize(): number;
}

/**
 * Slack sink configuration
 */
export interface SlackSinkConfig {
  /** Whether Slack log forwarding is enabled */
  enabled: boolean;
  /** Incoming webhook URL (empty when not configured) */
  webhookUrl: string;
  /** Maximum messages in retry buffer before dropping oldest */
  bufferSize: number;
  /** Initial retry delay in ms (exponential: 1000 -> 2000 -> 4000...) */
  retryDelayMs: number;
  /** Maximum retry attempts before dropping message */
  maxRetries: number;
}

/**
 * The subset of fetch the Slack code needs
 */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Timer scheduling used for retries, injectable for tests
 */
export interface TimerAPI {
  set(delayMs: number, callback: () => void): void;
  clearAll(): void;
}

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// Types for log filtering logic
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  /** Current minimum log level */
  currentLevel: LogLevel;
  /** Logger uptime in seconds */
  uptime: number;
  /** Hours after which to demote INFO logs */
  demoteHours: number;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// Types for sink initialization feedback
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 * Returned by sinks during initialization
 */
export interface InitMessage {
  /** Whether initialization succeeded */
  success: boolean;
  /** Human-readable status message */
  message: string;
}
