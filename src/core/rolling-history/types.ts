/**
 * Rolling history type definitions
 */

/**
 * One timestamped sample
 */
export interface HistorySample {
  /** Unix seconds */
  readonly timestamp: number;
  readonly value: number;
}

/**
 * Fixed-capacity FIFO of samples, oldest evicted on overflow
 */
export interface RollingHistory {
  /** Append a sample, evicting the oldest when full */
  push(timestamp: number, value: number): void;
  /** Values of the newest `count` samples (all when omitted), oldest first */
  latestValues(count?: number): number[];
  /** All samples, oldest first */
  samples(): readonly HistorySample[];
  size(): number;
  isFull(): boolean;
  readonly capacity: number;
}
