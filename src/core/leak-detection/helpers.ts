/**
 * Helper functions for leak detection
 */

import type { LeakDetectionState } from './types';

/**
 * Check whether the cooldown since the last alert is still running
 * @param state - Current detection state
 * @param nowSec - Current timestamp in seconds
 * @param cooldownSec - Minimum seconds between alerts
 */
export function isInCooldown(state: LeakDetectionState, nowSec: number, cooldownSec: number): boolean {
  if (state.lastAlertTime === null) {
    return false;
  }
  return (nowSec - state.lastAlertTime) < cooldownSec;
}

/**
 * Check whether a difference counts towards a leak
 * Strictly greater: a difference equal to the threshold resets the counter.
 */
export function exceedsThreshold(difference: number, thresholdPercent: number): boolean {
  return Math.abs(difference) > thresholdPercent;
}
