/**
 * Fixed-capacity sample history
 *
 * Mutates its buffer in place; readers get copies so callers can never
 * disturb the eviction order.
 */

import type { HistorySample, RollingHistory } from './types';

/**
 * Create an empty rolling history
 * @param capacity - Maximum retained samples (positive integer)
 * @throws {Error} If capacity is not a positive integer
 */
export function createRollingHistory(capacity: number): RollingHistory {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new Error("capacity must be a positive integer, got " + capacity);
  }

  const buffer: HistorySample[] = [];

  function push(timestamp: number, value: number): void {
    buffer.push({ timestamp: timestamp, value: value });
    if (buffer.length > capacity) {
      buffer.shift();
    }
  }

  function latestValues(count?: number): number[] {
    const start = count === undefined ? 0 : Math.max(0, buffer.length - count);
    return buffer.slice(start).map(function(s) { return s.value; });
  }

  function samples(): readonly HistorySample[] {
    return buffer.slice();
  }

  function size(): number {
    return buffer.length;
  }

  function isFull(): boolean {
    return buffer.length >= capacity;
  }

  return {
    push: push,
    latestValues: latestValues,
    samples: samples,
    size: size,
    isFull: isFull,
    capacity: capacity
  };
}
