/**
 * Calibration helper functions
 */

import type { Result } from '$types/common';
import { isInteger } from '@utils/number';
import type { CalibrationProfile } from './types';

/** Largest raw value the converter reports */
export const RAW_MAX = 65535;

/**
 * Check that a profile can be used for interpolation
 * @returns Error text, or null when usable
 */
export function describeCalibrationProblem(profile: CalibrationProfile): string | null {
  if (!isInteger(profile.emptyRaw) || profile.emptyRaw < 0 || profile.emptyRaw > RAW_MAX) {
    return "emptyRaw must be an integer between 0 and " + RAW_MAX + " (got " + profile.emptyRaw + ")";
  }
  if (!isInteger(profile.fullRaw) || profile.fullRaw < 0 || profile.fullRaw > RAW_MAX) {
    return "fullRaw must be an integer between 0 and " + RAW_MAX + " (got " + profile.fullRaw + ")";
  }
  if (profile.emptyRaw === profile.fullRaw) {
    return "emptyRaw and fullRaw must differ (both " + profile.emptyRaw + ")";
  }
  return null;
}

/**
 * Build a frozen profile after validating it
 */
export function createCalibrationProfile(emptyRaw: number, fullRaw: number): Result<CalibrationProfile> {
  const profile: CalibrationProfile = Object.freeze({ emptyRaw: emptyRaw, fullRaw: fullRaw });
  const problem = describeCalibrationProblem(profile);
  if (problem !== null) {
    return { ok: false, error: problem };
  }
  return { ok: true, value: profile };
}
