/**
 * Analog reader helper functions
 */

import type { Result } from '$types/common';
import { AcquisitionError } from '$types/errors';

export const CHANNEL_COUNT = 4;

/** Full-scale voltage at gain 1 */
export const FULL_SCALE_V = 4.096;

export function isValidChannel(channel: number): boolean {
  return Number.isInteger(channel) && channel >= 0 && channel < CHANNEL_COUNT;
}

/**
 * Signed 16-bit conversion result to the 0..65535 raw scale
 * Negative results (input below ground) read as 0.
 */
export function signedToRaw(signed: number): number {
  return Math.max(0, signed * 2);
}

export function signedToVolts(signed: number): number {
  return signed * FULL_SCALE_V / 32768;
}

/**
 * Run one acquisition and fold any failure into a Result
 */
export async function captureAcquisition<T>(channel: number, work: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await work() };
  } catch (err) {
    const error = err instanceof AcquisitionError
      ? err
      : new AcquisitionError(channel, err instanceof Error ? err.message : String(err));
    return { ok: false, error: error.message };
  }
}
