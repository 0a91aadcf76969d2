/**
 * Helper functions for the monitor service
 */

import type {
  CalibrationProfile,
  CombinedReading,
  HealthState,
  HealthStatus,
  MonitorUserConfig,
  RuntimeSettingKey,
  SensorId,
  SystemHealth
} from '$types';
import { fmtPercent } from '@logging';
import type { CalibrationValues } from '@system/dual-sensor';
import { RUNTIME_SETTING_KEYS } from '@validation';
import type { MonitorSettings } from './types';

export const HEALTH_ALERT_KIND = 'Sensor Health';
export const INIT_FAILURE_KIND = 'Initialization Failure';

export function pickSettings(config: MonitorUserConfig): MonitorSettings {
  return {
    SAMPLE_INTERVAL_SEC: config.SAMPLE_INTERVAL_SEC,
    LEAK_THRESHOLD_PERCENT: config.LEAK_THRESHOLD_PERCENT,
    ALERT_COOLDOWN_SEC: config.ALERT_COOLDOWN_SEC,
    CONSECUTIVE_READINGS_FOR_ALERT: config.CONSECUTIVE_READINGS_FOR_ALERT,
  };
}

export function pickRuntimeSettings(config: MonitorUserConfig): Pick<MonitorUserConfig, RuntimeSettingKey> {
  return {
    ...pickSettings(config),
    SLACK_ENABLED: config.SLACK_ENABLED,
    SLACK_CHANNEL: config.SLACK_CHANNEL,
    SLACK_MENTION_USERS: config.SLACK_MENTION_USERS,
  };
}

/**
 * Runtime settings whose values differ between two configurations
 */
export function changedSettingKeys(current: MonitorUserConfig, next: MonitorUserConfig): RuntimeSettingKey[] {
  return RUNTIME_SETTING_KEYS.filter(function(key) {
    return JSON.stringify(current[key]) !== JSON.stringify(next[key]);
  });
}

export function calibrationValuesOf(config: MonitorUserConfig): CalibrationValues {
  return {
    reference: { emptyRaw: config.REFERENCE_CALIBRATION_EMPTY, fullRaw: config.REFERENCE_CALIBRATION_FULL },
    control: { emptyRaw: config.CONTROL_CALIBRATION_EMPTY, fullRaw: config.CONTROL_CALIBRATION_FULL },
  };
}

export function sameCalibration(a: MonitorUserConfig, b: MonitorUserConfig): boolean {
  return a.REFERENCE_CALIBRATION_EMPTY === b.REFERENCE_CALIBRATION_EMPTY &&
    a.REFERENCE_CALIBRATION_FULL === b.REFERENCE_CALIBRATION_FULL &&
    a.CONTROL_CALIBRATION_EMPTY === b.CONTROL_CALIBRATION_EMPTY &&
    a.CONTROL_CALIBRATION_FULL === b.CONTROL_CALIBRATION_FULL;
}

export function formatReadingSummary(reading: CombinedReading): string {
  return 'Ref=' + fmtPercent(reading.reference.percentage) +
    ', Ctrl=' + fmtPercent(reading.control.percentage) +
    ', Diff=' + fmtPercent(reading.difference);
}

function describeSensor(id: SensorId, status: HealthStatus): string {
  const detail = status.issues.length > 0 ? status.issues.join('; ') : 'no issues';
  return id + ' (' + status.status + '): ' + detail;
}

/**
 * System alert text for a health transition into degraded or failed
 */
export function describeHealthChange(previous: HealthState, health: SystemHealth): string {
  return 'System health changed from ' + previous + ' to ' + health.systemStatus + '\n' +
    describeSensor('reference', health.reference) + '\n' +
    describeSensor('control', health.control);
}

/**
 * Copy a sensor's calibration into the matching config fields
 */
export function withSensorCalibration(
  config: MonitorUserConfig,
  id: SensorId,
  profile: CalibrationProfile
): MonitorUserConfig {
  if (id === 'reference') {
    return {
      ...config,
      REFERENCE_CALIBRATION_EMPTY: profile.emptyRaw,
      REFERENCE_CALIBRATION_FULL: profile.fullRaw,
    };
  }
  return {
    ...config,
    CONTROL_CALIBRATION_EMPTY: profile.emptyRaw,
    CONTROL_CALIBRATION_FULL: profile.fullRaw,
  };
}

/**
 * Cleanup runs on the first cycle and then once per interval
 */
export function isCleanupDue(lastCleanup: number | null, nowSec: number, intervalSec: number): boolean {
  return lastCleanup === null || nowSec - lastCleanup >= intervalSec;
}
