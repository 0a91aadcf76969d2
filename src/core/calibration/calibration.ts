/**
 * Two-point linear calibration
 *
 * Profiles are immutable. Calibrate and tare derive a new profile which the
 * owner swaps in whole, so a concurrent reader sees either the old pair or
 * the new pair and never a mix.
 */

import type { Result } from '$types/common';
import { clamp, roundTo } from '@utils/number';
import type { CalibrationPoint, CalibrationProfile } from './types';
import { createCalibrationProfile } from './helpers';

/**
 * Convert a raw reading to a fill percentage
 *
 * Orientation follows the sign of `emptyRaw - fullRaw`, so the empty endpoint
 * always maps to 0 and the full endpoint to 100.
 *
 * @param raw - Averaged raw reading
 * @param profile - Calibration endpoints
 * @returns Percentage clamped to [0, 100] and rounded to one decimal, or null
 *   when the endpoints are equal
 */
export function rawToPercentage(raw: number, profile: CalibrationProfile): number | null {
  const empty = profile.emptyRaw;
  const full = profile.fullRaw;
  if (empty === full) {
    return null;
  }

  let percentage: number;
  if (empty > full) {
    percentage = (empty - raw) / (empty - full) * 100;
  } else {
    percentage = (raw - empty) / (full - empty) * 100;
  }

  return roundTo(clamp(percentage, 0, 100), 1);
}

/**
 * Replace one endpoint
 * @returns New profile, or an error when the endpoints would coincide
 */
export function withCalibrationPoint(
  profile: CalibrationProfile,
  point: CalibrationPoint,
  raw: number
): Result<CalibrationProfile> {
  if (point === 'empty') {
    return createCalibrationProfile(raw, profile.fullRaw);
  }
  return createCalibrationProfile(profile.emptyRaw, raw);
}

/**
 * Move the empty endpoint so that `raw` reads as `targetPercentage`
 *
 * Solves the interpolation for emptyRaw with fullRaw fixed. Target 0 puts the
 * empty endpoint at the current raw value.
 *
 * @param raw - Current averaged raw reading
 * @param profile - Current calibration
 * @param targetPercentage - Level the current reading should show, in [0, 100)
 */
export function tareProfile(
  raw: number,
  profile: CalibrationProfile,
  targetPercentage: number
): Result<CalibrationProfile> {
  if (!(targetPercentage >= 0 && targetPercentage < 100)) {
    return { ok: false, error: "targetPercentage must be at least 0 and below 100 (got " + targetPercentage + ")" };
  }

  const fraction = targetPercentage / 100;
  const newEmpty = Math.round((raw - fraction * profile.fullRaw) / (1 - fraction));

  return createCalibrationProfile(newEmpty, profile.fullRaw);
}
