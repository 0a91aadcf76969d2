/**
 * Time helper functions
 */

/**
 * Seconds elapsed since a timestamp, never negative
 * @param nowSec - Current timestamp in seconds
 * @param sinceSec - Earlier timestamp in seconds
 * @returns Elapsed seconds (0 when the clock went backwards)
 */
export function elapsedSec(nowSec: number, sinceSec: number): number {
  const dt = nowSec - sinceSec;
  return dt > 0 ? dt : 0;
}

/**
 * Format a Unix timestamp as local "YYYY-MM-DD HH:MM:SS"
 * @param sec - Timestamp in seconds
 * @returns Formatted local date/time
 */
export function formatTimestamp(sec: number): string {
  const d = new Date(sec * 1000);
  return d.getFullYear() + '-' + pad2(d.getMonth() + 1) + '-' + pad2(d.getDate()) +
    ' ' + pad2(d.getHours()) + ':' + pad2(d.getMinutes()) + ':' + pad2(d.getSeconds());
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : String(n);
}
