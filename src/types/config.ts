/**
 * Type definition for leak monitor configuration
 */

import type { LogLevels } from '@logging';

/**
 * Converter backends the monitor can drive
 */
export type AdcDriverName = 'ads1115' | 'simulated';

/**
 * User-configurable settings
 * Everything a user might reasonably tune for sampling, alerting, hardware and observability
 */
export interface MonitorUserConfig {
  // ───────── SAMPLING ─────────
  readonly SAMPLE_INTERVAL_SEC: number;

  // ───────── LEAK DETECTION ─────────
  readonly LEAK_THRESHOLD_PERCENT: number;
  readonly CONSECUTIVE_READINGS_FOR_ALERT: number;
  readonly ALERT_COOLDOWN_SEC: number;

  // ───────── HARDWARE ─────────
  readonly ADC_DRIVER: AdcDriverName;
  readonly I2C_BUS: number;
  readonly I2C_ADDRESS: number;
  readonly REFERENCE_CHANNEL: number;
  readonly CONTROL_CHANNEL: number;

  // ───────── CALIBRATION ─────────
  readonly REFERENCE_CALIBRATION_EMPTY: number;
  readonly REFERENCE_CALIBRATION_FULL: number;
  readonly CONTROL_CALIBRATION_EMPTY: number;
  readonly CONTROL_CALIBRATION_FULL: number;
  readonly AUTO_RECOVERY: boolean;

  // ───────── SIMULATED CONVERTER ─────────
  readonly SIMULATED_REFERENCE_RAW: number;
  readonly SIMULATED_CONTROL_RAW: number;
  readonly SIMULATED_NOISE_RAW: number;

  // ───────── STORAGE ─────────
  readonly DATABASE_PATH: string;
  readonly DATA_RETENTION_DAYS: number;

  // ───────── SLACK SETTINGS ─────────
  readonly SLACK_ENABLED: boolean;
  readonly SLACK_CHANNEL: string;
  readonly SLACK_MENTION_USERS: readonly string[];
  readonly SLACK_LOG_LEVEL: number;
  readonly SLACK_BUFFER_SIZE: number;
  readonly SLACK_RETRY_DELAY_SEC: number;

  // ───────── CONSOLE SETTINGS ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: number;

  // ───────── FILE SETTINGS ─────────
  readonly LOG_FILE_PATH: string;
  readonly FILE_LOG_LEVEL: number;

  // ───────── GLOBAL LOGGING SETTINGS ─────────
  readonly GLOBAL_LOG_LEVEL: number;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Settings that may be changed while the monitor runs
 */
export type RuntimeSettingKey =
  | 'SAMPLE_INTERVAL_SEC'
  | 'LEAK_THRESHOLD_PERCENT'
  | 'ALERT_COOLDOWN_SEC'
  | 'CONSECUTIVE_READINGS_FOR_ALERT'
  | 'SLACK_ENABLED'
  | 'SLACK_CHANNEL'
  | 'SLACK_MENTION_USERS';

export type SettingsPatch = Partial<Pick<MonitorUserConfig, RuntimeSettingKey>>;

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface MonitorAppConstants {
  // ───────── LOGGING CONSTANTS ─────────
  readonly LOG_LEVELS: LogLevels;

  // ───────── ACQUISITION CONSTANTS ─────────
  readonly DEFAULT_SAMPLES: number;
  readonly CALIBRATION_SAMPLES: number;
  readonly SAMPLE_DELAY_MS: number;

  // ───────── HEALTH CONSTANTS ─────────
  readonly HISTORY_CAPACITY: number;
  readonly ERROR_STREAK_LIMIT: number;
  readonly VOLTAGE_WINDOW: number;
  readonly VOLTAGE_RANGE_MAX_V: number;
  readonly VOLTAGE_MIN_V: number;
  readonly VOLTAGE_MAX_V: number;
  readonly DRIFT_CHECK_INTERVAL_SEC: number;
  readonly DRIFT_MIN_HISTORY: number;
  readonly DRIFT_OLD_AGE_SEC: number;
  readonly DRIFT_RECENT_AGE_SEC: number;
  readonly DRIFT_MIN_SAMPLES: number;
  readonly DRIFT_MAX_V: number;
  readonly STUCK_WINDOW: number;
  readonly STUCK_MIN_UNIQUE: number;
  readonly STABILITY_WINDOW: number;
  readonly STABILITY_MIN_SAMPLES: number;
  readonly STABILITY_NEUTRAL_SCORE: number;

  // ───────── RECOVERY CONSTANTS ─────────
  readonly RECOVERY_PAUSE_MS: number;
  readonly RECOVERY_READS: number;
  readonly RECOVERY_READ_DELAY_MS: number;

  // ───────── LOOP CONSTANTS ─────────
  readonly LOOP_ERROR_BACKOFF_MS: number;
  readonly STOP_TIMEOUT_MS: number;
  readonly CLEANUP_INTERVAL_SEC: number;

  // ───────── COORDINATOR CONSTANTS ─────────
  readonly STATUS_LEAK_THRESHOLD_PERCENT: number;
}

/**
 * Complete monitor configuration
 * Combines user config and app constants
 */
export type MonitorConfig = MonitorUserConfig & MonitorAppConstants;
