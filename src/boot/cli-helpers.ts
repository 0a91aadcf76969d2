/**
 * Argument parsing and plain-text formatting for the command line
 *
 * Everything here returns uncoloured strings; the program decides on colour.
 */

import type { CombinedReading, SensorId, SensorReading } from '$types';
import { ValidationError } from '$types';
import type { CalibrationPoint } from '@core/calibration';
import { fmtPercent, fmtVolts } from '@logging';
import type { ReadingStatistics, StoredAlert, StoredReading } from '@storage';
import type { MonitorSettings, MonitorStatus } from '@system/monitor';
import { formatTimestamp } from '@utils/time';

export const DEFAULT_HISTORY_HOURS = 24;
export const MAX_HISTORY_HOURS = 24 * 30;
export const HISTORY_ROW_LIMIT = 20;
const BAR_WIDTH = 30;

export function parseSensorId(text: string): SensorId {
  if (text === 'reference' || text === 'control') return text;
  throw new ValidationError("Unknown sensor '" + text + "' (expected reference or control)");
}

export function parseCalibrationPoint(flags: { empty?: boolean; full?: boolean }): CalibrationPoint {
  const empty = flags.empty === true;
  const full = flags.full === true;
  if (empty === full) {
    throw new ValidationError('Choose exactly one of --empty or --full');
  }
  return empty ? 'empty' : 'full';
}

export function parseHours(text: string | undefined): number {
  if (text === undefined) return DEFAULT_HISTORY_HOURS;
  const hours = Number(text);
  if (!Number.isFinite(hours) || hours <= 0 || hours > MAX_HISTORY_HOURS) {
    throw new ValidationError('Hours must be between 0 and ' + MAX_HISTORY_HOURS + ' (got ' + text + ')');
  }
  return hours;
}

export function parseAlertId(text: string): number {
  const id = Number(text);
  if (!Number.isInteger(id) || id <= 0) {
    throw new ValidationError('Alert id must be a positive integer (got ' + text + ')');
  }
  return id;
}

export function parsePercentage(text: string): number {
  const value = Number(text);
  if (text.trim() === '' || !Number.isFinite(value) || value < 0 || value > 100) {
    throw new ValidationError('Target level must be between 0 and 100 (got ' + text + ')');
  }
  return value;
}

/**
 * Horizontal fill gauge, e.g. "███░░░"
 */
export function levelBar(percentage: number, width: number = BAR_WIDTH): string {
  const ratio = Math.min(Math.max(percentage, 0), 100) / 100;
  const filled = Math.round(ratio * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function sensorLine(label: string, reading: SensorReading): string {
  return label + fmtPercent(reading.percentage).padStart(7) +
    '  [' + levelBar(reading.percentage) + ']  raw ' + reading.raw + ', ' + fmtVolts(reading.voltage);
}

export function formatReadingLines(reading: CombinedReading): string[] {
  return [
    sensorLine('Reference:', reading.reference),
    sensorLine('Control:  ', reading.control),
    'Difference: ' + fmtPercent(reading.difference) + ' (' + reading.status + ')'
  ];
}

function describeLatest(reading: StoredReading | null): string {
  if (reading === null) return 'none';
  return 'Ref ' + fmtPercent(reading.referencePercentage) +
    ', Ctrl ' + fmtPercent(reading.controlPercentage) +
    ', Diff ' + fmtPercent(reading.difference) +
    ' at ' + formatTimestamp(reading.timestamp);
}

export function formatStatusLines(status: MonitorStatus): string[] {
  const lines = [
    'Monitoring:     ' + (status.running ? 'running' : 'stopped'),
    'Sensors:        ' + (status.sensorsInitialized ? 'initialized' : 'not initialized'),
    'System health:  ' + (status.systemHealth === null ? 'n/a' : status.systemHealth.systemStatus),
    'Leak state:     ' + status.leakState + ' (' + status.consecutiveLeakReadings + ' consecutive)',
    'Last alert:     ' + (status.lastAlertTime === null ? 'never' : formatTimestamp(status.lastAlertTime)),
    'Latest reading: ' + describeLatest(status.latestReading),
    'Active alerts:  ' + status.activeAlerts
  ];
  if (status.statistics !== null) {
    lines.push('Last 24h:       ' + status.statistics.readingCount + ' readings, avg difference ' +
      fmtPercent(status.statistics.avgDifference));
  }
  return lines;
}

export function formatSettingsLines(settings: MonitorSettings): string[] {
  return [
    'SAMPLE_INTERVAL_SEC            = ' + settings.SAMPLE_INTERVAL_SEC,
    'LEAK_THRESHOLD_PERCENT         = ' + settings.LEAK_THRESHOLD_PERCENT,
    'ALERT_COOLDOWN_SEC             = ' + settings.ALERT_COOLDOWN_SEC,
    'CONSECUTIVE_READINGS_FOR_ALERT = ' + settings.CONSECUTIVE_READINGS_FOR_ALERT
  ];
}

export function formatAlertLine(alert: StoredAlert): string {
  return '#' + alert.id + '  ' + formatTimestamp(alert.timestamp) + '  ' + alert.type + '  ' + alert.message;
}

export function formatStatisticsLines(stats: ReadingStatistics, hours: number): string[] {
  return [
    'Readings (last ' + hours + 'h): ' + stats.readingCount,
    'Avg reference:  ' + fmtPercent(stats.avgReference),
    'Avg control:    ' + fmtPercent(stats.avgControl),
    'Difference:     avg ' + fmtPercent(stats.avgDifference) +
      ', min ' + fmtPercent(stats.minDifference) +
      ', max ' + fmtPercent(stats.maxDifference),
    'Alerts:         ' + stats.alertCount
  ];
}

export function formatHistoryRow(reading: StoredReading): string {
  return formatTimestamp(reading.timestamp) +
    '  ref ' + fmtPercent(reading.referencePercentage).padStart(6) +
    '  ctrl ' + fmtPercent(reading.controlPercentage).padStart(6) +
    '  diff ' + fmtPercent(reading.difference).padStart(6) +
    (reading.status === 'leak_detected' ? '  LEAK' : '');
}
