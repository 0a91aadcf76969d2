/**
 * Helper functions for the dual-sensor coordinator
 */

import type { HealthState, ReadingStatus } from '$types/common';
import { roundTo } from '@utils/number';

export const NOT_INITIALIZED = 'Sensors not initialized';

/**
 * Worst of the two sensor states
 */
export function combineHealth(reference: HealthState, control: HealthState): HealthState {
  if (reference === 'failed' || control === 'failed') {
    return 'failed';
  }
  if (reference === 'degraded' || control === 'degraded') {
    return 'degraded';
  }
  return 'healthy';
}

/**
 * reference% - control%, rounded to one decimal
 */
export function levelDifference(referencePercent: number, controlPercent: number): number {
  return roundTo(referencePercent - controlPercent, 1);
}

/**
 * Informational status stored with each reading
 * Uses the unrounded difference; the alerting threshold lives in leak detection.
 */
export function readingStatus(referencePercent: number, controlPercent: number, thresholdPercent: number): ReadingStatus {
  return Math.abs(referencePercent - controlPercent) >= thresholdPercent ? 'leak_detected' : 'normal';
}
