/**
 * Persistence types
 */

import type { AlertRecord, CombinedReading, ReadingStatus } from '$types/common';

/**
 * A reading as stored, flattened to one row
 */
export interface StoredReading {
  readonly id: number;
  readonly timestamp: number;
  readonly referencePercentage: number;
  readonly referenceRaw: number;
  readonly referenceVoltage: number;
  readonly controlPercentage: number;
  readonly controlRaw: number;
  readonly controlVoltage: number;
  readonly difference: number;
  readonly status: ReadingStatus;
}

export interface StoredAlert extends AlertRecord {
  readonly id: number;
  /** Unix seconds, null while unacknowledged */
  readonly acknowledgedAt: number | null;
}

/**
 * One point of the history chart
 */
export interface ChartPoint {
  readonly timestamp: number;
  readonly reference: number;
  readonly control: number;
  readonly difference: number;
}

/**
 * Aggregates over a time window; averages are null when there are no readings
 */
export interface ReadingStatistics {
  readonly readingCount: number;
  readonly avgReference: number | null;
  readonly avgControl: number | null;
  readonly avgDifference: number | null;
  readonly minDifference: number | null;
  readonly maxDifference: number | null;
  readonly alertCount: number;
}

export interface CleanupResult {
  readonly readingsDeleted: number;
  readonly alertsDeleted: number;
}

/**
 * Reading and alert persistence
 *
 * Synchronous: every call completes before it returns.
 */
export interface ReadingStore {
  /** @returns Row id */
  storeReading(reading: CombinedReading): number;
  latestReading(): StoredReading | null;
  /** Newest first */
  getReadings(hours: number, limit?: number): StoredReading[];
  /** Oldest first, thinned to at most CHART_MAX_POINTS */
  getReadingsForChart(hours: number): ChartPoint[];
  /** @returns Alert id */
  storeAlert(alert: AlertRecord): number;
  /** Unacknowledged alerts, newest first */
  getActiveAlerts(): StoredAlert[];
  /** @returns False when no alert has that id */
  acknowledgeAlert(id: number): boolean;
  getStatistics(hours: number): ReadingStatistics;
  /** Drop readings, and acknowledged alerts, older than `days` */
  cleanupOldData(days: number): CleanupResult;
  close(): void;
}
