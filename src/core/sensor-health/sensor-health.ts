/**
 * Sensor health monitoring
 *
 * Tracks one sensor's voltage and raw history and runs four checks on demand:
 * error streak, voltage stability, calibration drift and stuck readings.
 *
 * check() is idempotent: the drift comparison runs at most once per
 * DRIFT_CHECK_INTERVAL_SEC and its verdict is kept until the next comparison,
 * so repeated calls without new samples give the same status.
 */

import type { HealthState, HealthStatus } from '$types/common';
import { createRollingHistory } from '@core/rolling-history';
import type { HealthMonitor, HealthMonitorConfig } from './types';
import {
  checkErrorStreak,
  checkVoltageStability,
  measureDrift,
  describeDrift,
  checkStuck,
  calculateStabilityScore,
  resolveHealthState
} from './helpers';

/**
 * Create a health monitor for one sensor
 *
 * @param config - Health thresholds and window sizes
 * @param clock - Current time in seconds
 * @returns Health monitor starting out healthy
 *
 * @example
 * ```typescript
 * const health = createHealthMonitor(CONFIG, now);
 * health.record(1.65, 33000);
 * const status = health.check();
 * if (status.status !== 'healthy') {
 *   logger.warning('reference: ' + status.issues.join('; '));
 * }
 * ```
 */
export function createHealthMonitor(config: HealthMonitorConfig, clock: () => number): HealthMonitor {
  const voltageHistory = createRollingHistory(config.HISTORY_CAPACITY);
  const rawHistory = createRollingHistory(config.HISTORY_CAPACITY);

  let consecutiveErrors = 0;
  let state: HealthState = 'healthy';
  let lastDriftCheck = clock();
  let driftIssue: string | null = null;
  let last: HealthStatus = {
    status: 'healthy',
    issues: [],
    stabilityScore: config.STABILITY_NEUTRAL_SCORE,
    consecutiveErrors: 0
  };

  function record(voltage: number, raw: number): void {
    const ts = clock();
    voltageHistory.push(ts, voltage);
    rawHistory.push(ts, raw);
    consecutiveErrors = 0;
  }

  function recordError(): void {
    consecutiveErrors++;
  }

  /**
   * Refresh the cached drift verdict when a comparison is due
   *
   * The check time only advances when both windows had enough samples, so a
   * sparse history is retried on the next call.
   */
  function refreshDrift(nowSec: number): void {
    if (nowSec - lastDriftCheck < config.DRIFT_CHECK_INTERVAL_SEC) {
      return;
    }
    if (voltageHistory.size() < config.DRIFT_MIN_HISTORY) {
      return;
    }

    const measurement = measureDrift(voltageHistory.samples(), nowSec, config);
    if (measurement === null) {
      return;
    }

    lastDriftCheck = nowSec;
    driftIssue = describeDrift(measurement, config.DRIFT_MAX_V);
  }

  function check(): HealthStatus {
    const issues: string[] = [];
    const voltages = voltageHistory.latestValues();

    const streakIssue = checkErrorStreak(consecutiveErrors, config.ERROR_STREAK_LIMIT);
    if (streakIssue !== null) {
      issues.push(streakIssue);
    }

    const voltageIssue = checkVoltageStability(voltages, config);
    if (voltageIssue !== null) {
      issues.push(voltageIssue);
    }

    refreshDrift(clock());
    if (driftIssue !== null) {
      issues.push(driftIssue);
    }

    const stuckIssue = checkStuck(rawHistory.latestValues(), config);
    if (stuckIssue !== null) {
      issues.push(stuckIssue);
    }

    state = resolveHealthState(state, issues.length, streakIssue !== null);

    last = {
      status: state,
      issues: issues,
      stabilityScore: calculateStabilityScore(voltages, config),
      consecutiveErrors: consecutiveErrors
    };
    return last;
  }

  function lastStatus(): HealthStatus {
    return last;
  }

  function lastVoltage(): number {
    const latest = voltageHistory.latestValues(1);
    return latest.length > 0 ? latest[0] : 0;
  }

  return {
    record: record,
    recordError: recordError,
    check: check,
    lastStatus: lastStatus,
    lastVoltage: lastVoltage
  };
}
