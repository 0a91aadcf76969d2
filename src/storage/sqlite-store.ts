/**
 * SQLite persistence for readings and alerts (better-sqlite3)
 *
 * Timestamps are stored as integer Unix seconds. Window queries are relative
 * to the injected clock.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { AlertRecord, CombinedReading } from '$types/common';
import { now } from '@utils/time';
import type { ChartPoint, CleanupResult, ReadingStatistics, ReadingStore, StoredAlert, StoredReading } from './types';
import type { AlertRow, ReadingRow } from './helpers';
import { CHART_MAX_POINTS, downsample, mapAlertRow, mapReadingRow, roundOrNull } from './helpers';

const SCHEMA = `
  create table if not exists readings (
    id integer primary key autoincrement,
    timestamp integer not null,
    reference_percentage real not null,
    reference_raw integer not null,
    reference_voltage real not null,
    control_percentage real not null,
    control_raw integer not null,
    control_voltage real not null,
    difference real not null,
    status text not null
  );

  create table if not exists alerts (
    id integer primary key autoincrement,
    timestamp integer not null,
    alert_type text not null,
    message text not null,
    difference real,
    acknowledged integer not null default 0,
    acknowledged_at integer
  );

  create index if not exists idx_readings_timestamp on readings(timestamp desc);
  create index if not exists idx_alerts_timestamp on alerts(timestamp desc);
`;

interface StatsRow {
  reading_count: number;
  avg_reference: number | null;
  avg_control: number | null;
  avg_difference: number | null;
  min_difference: number | null;
  max_difference: number | null;
}

/**
 * Open (creating if needed) the database at `filePath`
 *
 * @param filePath - Database file, or ':memory:'
 * @param clock - Current time in seconds
 */
export function createSqliteStore(filePath: string, clock: () => number = now): ReadingStore {
  const inMemory = filePath === ':memory:';
  if (!inMemory) {
    mkdirSync(dirname(filePath), { recursive: true });
  }

  const db = new Database(filePath);
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);

  const insertReading = db.prepare<[number, number, number, number, number, number, number, number, string]>(
    `insert into readings (
       timestamp, reference_percentage, reference_raw, reference_voltage,
       control_percentage, control_raw, control_voltage, difference, status
     ) values (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );
  const selectLatest = db.prepare<[], ReadingRow>(
    `select * from readings order by timestamp desc, id desc limit 1`
  );
  const selectSince = db.prepare<[number, number], ReadingRow>(
    `select * from readings where timestamp > ? order by timestamp desc, id desc limit ?`
  );
  const insertAlert = db.prepare<[number, string, string, number | null, number]>(
    `insert into alerts (timestamp, alert_type, message, difference, acknowledged) values (?, ?, ?, ?, ?)`
  );
  const selectActive = db.prepare<[], AlertRow>(
    `select * from alerts where acknowledged = 0 order by timestamp desc, id desc`
  );
  const updateAck = db.prepare<[number, number]>(
    `update alerts set acknowledged = 1, acknowledged_at = ? where id = ?`
  );
  const selectStats = db.prepare<[number], StatsRow>(
    `select
       count(*) as reading_count,
       avg(reference_percentage) as avg_reference,
       avg(control_percentage) as avg_control,
       avg(difference) as avg_difference,
       min(difference) as min_difference,
       max(difference) as max_difference
     from readings where timestamp > ?`
  );
  const countAlerts = db.prepare<[number], { alert_count: number }>(
    `select count(*) as alert_count from alerts where timestamp > ?`
  );
  const deleteReadings = db.prepare<[number]>(`delete from readings where timestamp < ?`);
  const deleteAlerts = db.prepare<[number]>(`delete from alerts where timestamp < ? and acknowledged = 1`);

  function since(hours: number): number {
    return clock() - hours * 3600;
  }

  function storeReading(reading: CombinedReading): number {
    const info = insertReading.run(
      reading.timestamp,
      reading.reference.percentage,
      reading.reference.raw,
      reading.reference.voltage,
      reading.control.percentage,
      reading.control.raw,
      reading.control.voltage,
      reading.difference,
      reading.status
    );
    return Number(info.lastInsertRowid);
  }

  function latestReading(): StoredReading | null {
    const row = selectLatest.get();
    return row ? mapReadingRow(row) : null;
  }

  function getReadings(hours: number, limit?: number): StoredReading[] {
    // sqlite treats a negative limit as no limit
    return selectSince.all(since(hours), limit === undefined ? -1 : limit).map(mapReadingRow);
  }

  function getReadingsForChart(hours: number): ChartPoint[] {
    const chronological = getReadings(hours).reverse();
    return downsample(chronological, CHART_MAX_POINTS).map(function(r) {
      return {
        timestamp: r.timestamp,
        reference: r.referencePercentage,
        control: r.controlPercentage,
        difference: r.difference
      };
    });
  }

  function storeAlert(alert: AlertRecord): number {
    const info = insertAlert.run(
      alert.timestamp,
      alert.type,
      alert.message,
      alert.difference,
      alert.acknowledged ? 1 : 0
    );
    return Number(info.lastInsertRowid);
  }

  function getActiveAlerts(): StoredAlert[] {
    return selectActive.all().map(mapAlertRow);
  }

  function acknowledgeAlert(id: number): boolean {
    return updateAck.run(clock(), id).changes > 0;
  }

  function getStatistics(hours: number): ReadingStatistics {
    const from = since(hours);
    const stats = selectStats.get(from);
    const alerts = countAlerts.get(from);

    return {
      readingCount: stats ? stats.reading_count : 0,
      avgReference: stats ? roundOrNull(stats.avg_reference) : null,
      avgControl: stats ? roundOrNull(stats.avg_control) : null,
      avgDifference: stats ? roundOrNull(stats.avg_difference) : null,
      minDifference: stats ? roundOrNull(stats.min_difference) : null,
      maxDifference: stats ? roundOrNull(stats.max_difference) : null,
      alertCount: alerts ? alerts.alert_count : 0
    };
  }

  function cleanupOldData(days: number): CleanupResult {
    const cutoff = clock() - days * 86400;
    const purge = db.transaction(function(): CleanupResult {
      const readings = deleteReadings.run(cutoff).changes;
      const alerts = deleteAlerts.run(cutoff).changes;
      return { readingsDeleted: readings, alertsDeleted: alerts };
    });
    return purge();
  }

  function close(): void {
    db.close();
  }

  return {
    storeReading: storeReading,
    latestReading: latestReading,
    getReadings: getReadings,
    getReadingsForChart: getReadingsForChart,
    storeAlert: storeAlert,
    getActiveAlerts: getActiveAlerts,
    acknowledgeAlert: acknowledgeAlert,
    getStatistics: getStatistics,
    cleanupOldData: cleanupOldData,
    close: close
  };
}
