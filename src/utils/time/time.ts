/**
 * Time utility functions
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Get current timestamp in milliseconds
 * @returns Current time in milliseconds since epoch
 */
export function nowMs(): number {
  return Date.now();
}

/**
 * Sleep for the given number of milliseconds
 *
 * Resolves early (with `false`) when the signal aborts, so long waits in the
 * sampling loop never hold up shutdown.
 *
 * @param ms - Delay in milliseconds
 * @param signal - Optional abort signal
 * @returns True if the full delay elapsed, false if it was interrupted
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal && signal.aborted) {
    return false;
  }

  try {
    await delay(ms, undefined, { signal: signal });
    return true;
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      return false;
    }
    throw err;
  }
}

/** Sleep function signature, injected wherever tests need to skip real delays */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<boolean>;
