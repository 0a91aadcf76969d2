/**
 * Leak detection types
 */

import type { MonitorUserConfig } from '$types/config';

/**
 * Hysteresis state carried between cycles
 */
export interface LeakDetectionState {
  /** Cycles in a row with |difference| above the threshold */
  readonly consecutiveLeakReadings: number;
  /** Unix seconds of the last alert that fired, null before the first */
  readonly lastAlertTime: number | null;
}

/**
 * Named phase derived from the state, for status reporting
 * - NORMAL: counter at zero, no alert cooling down
 * - ACCUMULATING: counting qualifying readings
 * - ALERTED: an alert fired within the cooldown window
 */
export type LeakPhase = 'NORMAL' | 'ACCUMULATING' | 'ALERTED';

/**
 * What the caller should do after an evaluation
 * - none: nothing to report
 * - fire: dispatch an alert, then commit with markAlertFired()
 * - suppressed: an alert is due but the cooldown holds it back
 */
export type LeakAction = 'none' | 'fire' | 'suppressed';

export interface LeakEvaluation {
  readonly state: LeakDetectionState;
  readonly action: LeakAction;
}

/**
 * Configuration for leak detection
 * Maps to MonitorUserConfig properties
 */
export type LeakDetectionConfig = Pick<MonitorUserConfig,
  | 'LEAK_THRESHOLD_PERCENT'
  | 'CONSECUTIVE_READINGS_FOR_ALERT'
  | 'ALERT_COOLDOWN_SEC'
>;
