/**
 * Sensor health monitoring type definitions
 */

import type { HealthStatus } from '$types/common';
import type { MonitorAppConstants } from '$types/config';

/**
 * Engine constants the health monitor needs
 */
export type HealthMonitorConfig = Pick<MonitorAppConstants,
  | 'HISTORY_CAPACITY'
  | 'ERROR_STREAK_LIMIT'
  | 'VOLTAGE_WINDOW'
  | 'VOLTAGE_RANGE_MAX_V'
  | 'VOLTAGE_MIN_V'
  | 'VOLTAGE_MAX_V'
  | 'DRIFT_CHECK_INTERVAL_SEC'
  | 'DRIFT_MIN_HISTORY'
  | 'DRIFT_OLD_AGE_SEC'
  | 'DRIFT_RECENT_AGE_SEC'
  | 'DRIFT_MIN_SAMPLES'
  | 'DRIFT_MAX_V'
  | 'STUCK_WINDOW'
  | 'STUCK_MIN_UNIQUE'
  | 'STABILITY_WINDOW'
  | 'STABILITY_MIN_SAMPLES'
  | 'STABILITY_NEUTRAL_SCORE'
>;

/**
 * Mean voltage of the oldest and newest parts of the history
 */
export interface DriftMeasurement {
  readonly oldMean: number;
  readonly recentMean: number;
  /** |recentMean - oldMean| in volts */
  readonly drift: number;
}

/**
 * Per-sensor health tracker
 *
 * Collects voltage and raw history and turns it into a HealthStatus.
 */
export interface HealthMonitor {
  /** Add a successful sample; resets the error streak */
  record(voltage: number, raw: number): void;
  /** Count a failed acquisition */
  recordError(): void;
  /** Run all checks and resolve the status */
  check(): HealthStatus;
  /** Status from the last check() without re-running anything */
  lastStatus(): HealthStatus;
  /** Last recorded voltage, 0 when nothing recorded */
  lastVoltage(): number;
}
