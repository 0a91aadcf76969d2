/**
 * Sensor types
 */

import type { CalibrationProfile, HealthStatus, Result, SensorId, SensorReading } from '$types/common';
import type { MonitorAppConstants } from '$types/config';
import type { AnalogReader, ChannelLock } from '@hardware/adc';
import type { CalibrationPoint, TareResult } from '@core/calibration';
import type { HealthMonitor } from '@core/sensor-health';
import type { Logger } from '@logging';
import type { SleepFn } from '@utils/time';

/**
 * Engine constants a sensor needs
 */
export type SensorConfig = Pick<MonitorAppConstants,
  | 'DEFAULT_SAMPLES'
  | 'CALIBRATION_SAMPLES'
  | 'SAMPLE_DELAY_MS'
  | 'RECOVERY_PAUSE_MS'
  | 'RECOVERY_READS'
  | 'RECOVERY_READ_DELAY_MS'
>;

export interface SensorOptions {
  id: SensorId;
  /** Converter channel 0..3 */
  channel: number;
  calibration: CalibrationProfile;
  /** Flush stuck readings with a few throwaway conversions */
  autoRecovery: boolean;
}

export interface SensorDependencies {
  reader: AnalogReader;
  lock: ChannelLock;
  health: HealthMonitor;
  logger: Logger;
  sleep: SleepFn;
  /** Current time in seconds */
  clock: () => number;
}

/**
 * One water level sensor on one converter channel
 */
export interface WaterLevelSensor {
  readonly id: SensorId;
  readonly channel: number;
  /** Averaged raw value, 0 when every sample failed */
  readRaw(samples?: number): Promise<number>;
  /** Averaged voltage, 0 when every sample failed */
  readVoltage(samples?: number): Promise<number>;
  /** Current fill level; on failure the last good level (or 0) */
  readPercentage(): Promise<number>;
  /** readPercentage() plus the raw and voltage it was based on */
  readLevel(): Promise<SensorReading>;
  /** Store the present raw value as the empty or full endpoint */
  calibrate(point: CalibrationPoint): Promise<Result<number>>;
  /** Shift the empty endpoint so the present level reads as targetPercentage */
  tare(targetPercentage?: number): Promise<Result<TareResult>>;
  getCalibration(): CalibrationProfile;
  /** Replace both endpoints; logs only when they change */
  setCalibration(profile: CalibrationProfile): Result<void>;
  /** Run the health checks */
  healthStatus(): HealthStatus;
  /** Last averaged raw value, null before the first good read */
  lastRaw(): number | null;
  /** Last averaged voltage, null before the first good read */
  lastVoltage(): number | null;
}
