/**
 * Dual-sensor coordinator types
 */

import type { CalibrationProfile, CombinedReading, Result, SensorId, SystemHealth } from '$types/common';
import type { MonitorAppConstants } from '$types/config';
import type { AnalogReader } from '@hardware/adc';
import type { WaterLevelSensor } from '@hardware/sensors';
import type { CalibrationPoint, TareResult } from '@core/calibration';
import type { Logger } from '@logging';

export type CoordinatorConfig = Pick<MonitorAppConstants, 'STATUS_LEAK_THRESHOLD_PERCENT'>;

export interface CoordinatorDependencies {
  /** Open the converter both sensors share */
  openReader: () => Promise<AnalogReader>;
  /** Build one sensor on the opened converter; may throw */
  createSensor: (id: SensorId, reader: AnalogReader) => WaterLevelSensor;
  logger: Logger;
  /** Current time in seconds */
  clock: () => number;
}

export interface CalibrationOutcome {
  readonly sensor: SensorId;
  readonly point: CalibrationPoint;
  readonly rawValue: number;
}

export type CalibrationValues = Readonly<Record<SensorId, CalibrationProfile>>;

/**
 * Owns the converter and both sensors
 *
 * Either both sensors are up or neither is; every operation on an
 * uninitialized coordinator returns a failed Result.
 */
export interface DualSensorCoordinator {
  initialize(): Promise<Result<void>>;
  isInitialized(): boolean;
  /** Reference first, then control */
  readBoth(): Promise<Result<CombinedReading>>;
  systemHealth(): Result<SystemHealth>;
  calibrateSensor(id: SensorId, point: CalibrationPoint): Promise<Result<CalibrationOutcome>>;
  tareSensor(id: SensorId, targetPercentage?: number): Promise<Result<TareResult>>;
  getCalibrationValues(): Result<CalibrationValues>;
  /** Apply endpoints loaded elsewhere, e.g. from a config file saved by another process */
  setCalibrationValues(values: CalibrationValues): Result<void>;
  cleanup(): Promise<void>;
}
