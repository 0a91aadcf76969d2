/**
 * Common type definitions used throughout the project
 */

/**
 * Identifies one of the two physical sensors
 * - reference: sealed tank, only sees environmental effects
 * - control: monitored tank, the one that can leak
 */
export type SensorId = 'reference' | 'control';

/**
 * Linear two-point calibration for one sensor
 *
 * Resistance drops as water rises, so the larger raw value conventionally
 * belongs to the empty endpoint. The ordering is re-derived at read time.
 */
export interface CalibrationProfile {
  readonly emptyRaw: number;
  readonly fullRaw: number;
}

/**
 * One averaged sample of a single sensor
 */
export interface SensorReading {
  readonly raw: number;
  readonly voltage: number;
  /** Fill level, clamped to [0, 100] and rounded to one decimal */
  readonly percentage: number;
  /** Unix seconds */
  readonly timestamp: number;
}

export type ReadingStatus = 'normal' | 'leak_detected';

/**
 * Both sensors sampled in the same cycle
 */
export interface CombinedReading {
  readonly reference: SensorReading;
  readonly control: SensorReading;
  /** reference% - control% */
  readonly difference: number;
  readonly status: ReadingStatus;
  readonly timestamp: number;
}

/**
 * Alert as handed to persistence. `id` is assigned by the store.
 */
export interface AlertRecord {
  readonly type: string;
  readonly message: string;
  readonly difference: number | null;
  readonly timestamp: number;
  readonly acknowledged: boolean;
}

export type HealthState = 'healthy' | 'degraded' | 'failed';

/**
 * Health verdict for one sensor
 */
export interface HealthStatus {
  readonly status: HealthState;
  readonly issues: readonly string[];
  /** 0..100, higher is steadier */
  readonly stabilityScore: number;
  readonly consecutiveErrors: number;
}

/**
 * Aggregated health of both sensors
 */
export interface SystemHealth {
  readonly systemStatus: HealthState;
  readonly reference: HealthStatus;
  readonly control: HealthStatus;
}

/**
 * Success/failure variant for operations that must never throw
 */
export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string };
