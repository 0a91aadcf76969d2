/**
 * Row mapping and chart thinning
 */

import type { ReadingStatus } from '$types/common';
import { roundTo } from '@utils/number';
import type { StoredAlert, StoredReading } from './types';

export const CHART_MAX_POINTS = 200;

export interface ReadingRow {
  id: number;
  timestamp: number;
  reference_percentage: number;
  reference_raw: number;
  reference_voltage: number;
  control_percentage: number;
  control_raw: number;
  control_voltage: number;
  difference: number;
  status: string;
}

export interface AlertRow {
  id: number;
  timestamp: number;
  alert_type: string;
  message: string;
  difference: number | null;
  acknowledged: number;
  acknowledged_at: number | null;
}

function toStatus(value: string): ReadingStatus {
  return value === 'leak_detected' ? 'leak_detected' : 'normal';
}

export function mapReadingRow(row: ReadingRow): StoredReading {
  return {
    id: row.id,
    timestamp: row.timestamp,
    referencePercentage: row.reference_percentage,
    referenceRaw: row.reference_raw,
    referenceVoltage: row.reference_voltage,
    controlPercentage: row.control_percentage,
    controlRaw: row.control_raw,
    controlVoltage: row.control_voltage,
    difference: row.difference,
    status: toStatus(row.status)
  };
}

export function mapAlertRow(row: AlertRow): StoredAlert {
  return {
    id: row.id,
    type: row.alert_type,
    message: row.message,
    difference: row.difference,
    timestamp: row.timestamp,
    acknowledged: row.acknowledged !== 0,
    acknowledgedAt: row.acknowledged_at
  };
}

/**
 * Keep every step-th item so at most `maxPoints` remain
 */
export function downsample<T>(items: readonly T[], maxPoints: number): T[] {
  if (items.length <= maxPoints) {
    return items.slice();
  }
  const step = Math.ceil(items.length / maxPoints);
  const kept: T[] = [];
  for (let i = 0; i < items.length; i += step) {
    kept.push(items[i]);
  }
  return kept;
}

export function roundOrNull(value: number | null): number | null {
  return value === null ? null : roundTo(value, 1);
}
