/**
 * Calibration type definitions
 */

import type { CalibrationProfile } from '$types/common';

export type { CalibrationProfile };

/**
 * Outcome of a tare
 */
export interface TareResult {
  readonly oldEmpty: number;
  readonly newEmpty: number;
  /** Voltage measured at tare time */
  readonly voltage: number;
}

/**
 * Which endpoint a calibration sample belongs to
 */
export type CalibrationPoint = 'empty' | 'full';
