/**
 * Pure health checks
 *
 * Each check returns an issue message or null.
 */

import type { HealthState } from '$types/common';
import type { HistorySample } from '@core/rolling-history';
import { mean, range, roundTo } from '@utils/number';
import type { DriftMeasurement, HealthMonitorConfig } from './types';

/**
 * @param consecutiveErrors - Current failed-read streak
 * @param limit - Streak length that is tolerated
 */
export function checkErrorStreak(consecutiveErrors: number, limit: number): string | null {
  if (consecutiveErrors > limit) {
    return "Consecutive read errors: " + consecutiveErrors;
  }
  return null;
}

/**
 * Check the newest voltages for spread and implausible levels
 *
 * Needs a full window. Spread wins over level when both apply.
 */
export function checkVoltageStability(voltages: readonly number[], config: HealthMonitorConfig): string | null {
  if (voltages.length < config.VOLTAGE_WINDOW) {
    return null;
  }

  const recent = voltages.slice(-config.VOLTAGE_WINDOW);
  const spread = range(recent);
  if (spread > config.VOLTAGE_RANGE_MAX_V) {
    return "Unstable voltage: " + spread.toFixed(3) + "V range";
  }

  const avg = mean(recent);
  if (avg < config.VOLTAGE_MIN_V) {
    return "Voltage too low - possible disconnection";
  }
  if (avg > config.VOLTAGE_MAX_V) {
    return "Voltage too high - possible short circuit";
  }
  return null;
}

/**
 * Compare samples older than DRIFT_OLD_AGE_SEC with those newer than DRIFT_RECENT_AGE_SEC
 * @returns Measurement, or null when either side has too few samples
 */
export function measureDrift(
  samples: readonly HistorySample[],
  nowSec: number,
  config: HealthMonitorConfig
): DriftMeasurement | null {
  const old: number[] = [];
  const recent: number[] = [];

  for (const s of samples) {
    const age = nowSec - s.timestamp;
    if (age > config.DRIFT_OLD_AGE_SEC) {
      old.push(s.value);
    } else if (age < config.DRIFT_RECENT_AGE_SEC) {
      recent.push(s.value);
    }
  }

  if (old.length < config.DRIFT_MIN_SAMPLES || recent.length < config.DRIFT_MIN_SAMPLES) {
    return null;
  }

  const oldMean = mean(old);
  const recentMean = mean(recent);
  return { oldMean: oldMean, recentMean: recentMean, drift: Math.abs(recentMean - oldMean) };
}

export function describeDrift(measurement: DriftMeasurement, maxDriftV: number): string | null {
  if (measurement.drift > maxDriftV) {
    return "Possible calibration drift: " + measurement.drift.toFixed(3) + "V change in 24h";
  }
  return null;
}

/**
 * Flag a raw signal that barely moves
 *
 * Fewer than STUCK_MIN_UNIQUE distinct values over the window means the
 * converter input is frozen.
 */
export function checkStuck(raws: readonly number[], config: HealthMonitorConfig): string | null {
  if (raws.length < config.STUCK_WINDOW) {
    return null;
  }

  const unique = new Set(raws.slice(-config.STUCK_WINDOW)).size;
  if (unique < config.STUCK_MIN_UNIQUE) {
    return "Sensor appears stuck: only " + unique + " unique values in " + config.STUCK_WINDOW + " readings";
  }
  return null;
}

/**
 * 0..100 score, 100 meaning a perfectly flat voltage
 */
export function calculateStabilityScore(voltages: readonly number[], config: HealthMonitorConfig): number {
  if (voltages.length < config.STABILITY_MIN_SAMPLES) {
    return config.STABILITY_NEUTRAL_SCORE;
  }

  const spread = range(voltages.slice(-config.STABILITY_WINDOW));
  return roundTo(Math.max(0, 100 - spread * 100), 1);
}

/**
 * Resolve the next status
 *
 * - An error streak forces failed
 * - A clean check lifts failed back to healthy
 * - Any issue moves healthy to degraded
 * - Otherwise the previous status stands
 */
export function resolveHealthState(
  previous: HealthState,
  issueCount: number,
  errorStreak: boolean
): HealthState {
  const current: HealthState = errorStreak ? 'failed' : previous;

  if (issueCount === 0 && current === 'failed') {
    return 'healthy';
  }
  if (issueCount > 0 && current === 'healthy') {
    return 'degraded';
  }
  return current;
}
