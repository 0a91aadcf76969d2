/**
 * Leak detection state machine
 *
 * Compares each cycle's reference/control difference against the leak
 * threshold and asks for an alert once enough qualifying readings arrive
 * in a row. Alerts are rate limited by a cooldown.
 *
 * The functions are pure. evaluateLeak() never commits a fired alert by
 * itself: the dispatcher calls markAlertFired() only after the alert has been
 * stored, so a failed store is retried on the next qualifying cycle.
 */

import type { LeakDetectionState, LeakDetectionConfig, LeakEvaluation, LeakPhase } from './types';
import { isInCooldown, exceedsThreshold } from './helpers';

export type { LeakDetectionState, LeakDetectionConfig, LeakEvaluation, LeakPhase };

/**
 * Initialize leak detection state
 * @returns Fresh state with no readings counted and no alert sent
 */
export function initLeakDetectionState(): LeakDetectionState {
  return {
    consecutiveLeakReadings: 0,
    lastAlertTime: null,
  };
}

/**
 * Feed one difference into the detector
 *
 * @param difference - reference% - control% for this cycle
 * @param nowSec - Current timestamp in seconds
 * @param state - Current detection state
 * @param config - Threshold, required count and cooldown
 * @returns Next state and the action to take
 *
 * @remarks
 * **Hysteresis**: Any reading at or under the threshold resets the counter.
 * A suppressed alert keeps the counter, so the next qualifying reading
 * after the cooldown fires straight away.
 *
 * @example
 * ```typescript
 * const result = evaluateLeak(reading.difference, now(), state, config);
 * if (result.action === 'fire') {
 *   await storeAndNotify(reading);
 *   state = markAlertFired(result.state, now());
 * } else {
 *   state = result.state;
 * }
 * ```
 */
export function evaluateLeak(
  difference: number,
  nowSec: number,
  state: LeakDetectionState,
  config: LeakDetectionConfig
): LeakEvaluation {
  if (!exceedsThreshold(difference, config.LEAK_THRESHOLD_PERCENT)) {
    return {
      state: { consecutiveLeakReadings: 0, lastAlertTime: state.lastAlertTime },
      action: 'none',
    };
  }

  const next: LeakDetectionState = {
    consecutiveLeakReadings: state.consecutiveLeakReadings + 1,
    lastAlertTime: state.lastAlertTime,
  };

  if (next.consecutiveLeakReadings < config.CONSECUTIVE_READINGS_FOR_ALERT) {
    return { state: next, action: 'none' };
  }

  if (isInCooldown(next, nowSec, config.ALERT_COOLDOWN_SEC)) {
    return { state: next, action: 'suppressed' };
  }

  return { state: next, action: 'fire' };
}

/**
 * Commit a fired alert: record its time and restart counting
 */
export function markAlertFired(_state: LeakDetectionState, nowSec: number): LeakDetectionState {
  return {
    consecutiveLeakReadings: 0,
    lastAlertTime: nowSec,
  };
}

/**
 * Derive the reporting phase
 * A running cooldown wins over an active count.
 */
export function getLeakPhase(state: LeakDetectionState, nowSec: number, config: LeakDetectionConfig): LeakPhase {
  if (isInCooldown(state, nowSec, config.ALERT_COOLDOWN_SEC)) {
    return 'ALERTED';
  }
  if (state.consecutiveLeakReadings > 0) {
    return 'ACCUMULATING';
  }
  return 'NORMAL';
}
