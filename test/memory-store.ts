/**
 * In-process ReadingStore for engine tests
 */

import type { AlertRecord, CombinedReading } from '$types/common';
import type { ReadingStore, StoredAlert, StoredReading } from '@storage';

export interface MemoryStore extends ReadingStore {
  readings: StoredReading[];
  alerts: StoredAlert[];
  /** Make storeAlert throw */
  failAlerts: boolean;
  cleanups: number[];
  closed: boolean;
}

export function createMemoryStore(): MemoryStore {
  const store: MemoryStore = {
    readings: [],
    alerts: [],
    failAlerts: false,
    cleanups: [],
    closed: false,
    storeReading: (reading: CombinedReading) => {
      const id = store.readings.length + 1;
      store.readings.push({
        id: id,
        timestamp: reading.timestamp,
        referencePercentage: reading.reference.percentage,
        referenceRaw: reading.reference.raw,
        referenceVoltage: reading.reference.voltage,
        controlPercentage: reading.control.percentage,
        controlRaw: reading.control.raw,
        controlVoltage: reading.control.voltage,
        difference: reading.difference,
        status: reading.status
      });
      return id;
    },
    latestReading: () => store.readings.length > 0 ? store.readings[store.readings.length - 1] : null,
    getReadings: (_hours, limit) => store.readings.slice().reverse().slice(0, limit),
    getReadingsForChart: () => store.readings.map((r) => ({
      timestamp: r.timestamp,
      reference: r.referencePercentage,
      control: r.controlPercentage,
      difference: r.difference
    })),
    storeAlert: (alert: AlertRecord) => {
      if (store.failAlerts) throw new Error('disk I/O error');
      const id = store.alerts.length + 1;
      store.alerts.push({ ...alert, id: id, acknowledgedAt: null });
      return id;
    },
    getActiveAlerts: () => store.alerts.filter((a) => !a.acknowledged),
    acknowledgeAlert: (id) => {
      const index = store.alerts.findIndex((a) => a.id === id);
      if (index === -1) return false;
      store.alerts[index] = { ...store.alerts[index], acknowledged: true, acknowledgedAt: 0 };
      return true;
    },
    getStatistics: () => ({
      readingCount: store.readings.length,
      avgReference: null,
      avgControl: null,
      avgDifference: null,
      minDifference: null,
      maxDifference: null,
      alertCount: store.alerts.length
    }),
    cleanupOldData: (days) => {
      store.cleanups.push(days);
      return { readingsDeleted: 0, alertsDeleted: 0 };
    },
    close: () => {
      store.closed = true;
    }
  };
  return store;
}
