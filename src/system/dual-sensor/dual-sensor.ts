/**
 * Dual-sensor coordinator
 *
 * Samples the reference and the control sensor in the same cycle and
 * reports their level difference, combined health and calibration.
 */

import type { CombinedReading, Result, SensorId, SystemHealth } from '$types/common';
import type { AnalogReader } from '@hardware/adc';
import type { WaterLevelSensor } from '@hardware/sensors';
import { describeCalibrationProblem } from '@core/calibration';
import type { CalibrationPoint, TareResult } from '@core/calibration';
import type {
  CalibrationOutcome,
  CalibrationValues,
  CoordinatorConfig,
  CoordinatorDependencies,
  DualSensorCoordinator
} from './types';
import { NOT_INITIALIZED, combineHealth, levelDifference, readingStatus } from './helpers';

interface SensorPair {
  reader: AnalogReader;
  reference: WaterLevelSensor;
  control: WaterLevelSensor;
}

/**
 * Create a dual-sensor coordinator
 *
 * @param config - Informational leak threshold for the reading status
 * @param deps - Converter and sensor factories, logger, clock
 *
 * @example
 * ```typescript
 * const sensors = createDualSensorCoordinator(CONFIG, deps);
 * const init = await sensors.initialize();
 * if (init.ok) {
 *   const reading = await sensors.readBoth();
 * }
 * ```
 */
export function createDualSensorCoordinator(
  config: CoordinatorConfig,
  deps: CoordinatorDependencies
): DualSensorCoordinator {
  const logger = deps.logger;
  let pair: SensorPair | null = null;

  async function initialize(): Promise<Result<void>> {
    if (pair !== null) {
      return { ok: true, value: undefined };
    }

    let reader: AnalogReader | null = null;
    try {
      reader = await deps.openReader();
      const reference = deps.createSensor('reference', reader);
      const control = deps.createSensor('control', reader);
      pair = { reader: reader, reference: reference, control: control };
      logger.info('Dual sensor monitor initialized with ' + reader.name);
      return { ok: true, value: undefined };
    } catch (err) {
      const message = 'Failed to initialize sensors: ' + String(err);
      logger.critical(message);
      if (reader !== null) {
        await closeReader(reader);
      }
      return { ok: false, error: message };
    }
  }

  async function closeReader(reader: AnalogReader): Promise<void> {
    try {
      await reader.close();
    } catch (err) {
      logger.warning('Error closing ' + reader.name + ': ' + String(err));
    }
  }

  function sensorFor(current: SensorPair, id: SensorId): WaterLevelSensor {
    return id === 'reference' ? current.reference : current.control;
  }

  async function readBoth(): Promise<Result<CombinedReading>> {
    const current = pair;
    if (current === null) {
      return { ok: false, error: NOT_INITIALIZED };
    }

    try {
      const reference = await current.reference.readLevel();
      const control = await current.control.readLevel();
      return {
        ok: true,
        value: {
          reference: reference,
          control: control,
          difference: levelDifference(reference.percentage, control.percentage),
          status: readingStatus(reference.percentage, control.percentage, config.STATUS_LEAK_THRESHOLD_PERCENT),
          timestamp: deps.clock()
        }
      };
    } catch (err) {
      logger.warning('Error reading sensors: ' + String(err));
      return { ok: false, error: String(err) };
    }
  }

  function systemHealth(): Result<SystemHealth> {
    if (pair === null) {
      return { ok: false, error: NOT_INITIALIZED };
    }
    const reference = pair.reference.healthStatus();
    const control = pair.control.healthStatus();
    return {
      ok: true,
      value: {
        systemStatus: combineHealth(reference.status, control.status),
        reference: reference,
        control: control
      }
    };
  }

  async function calibrateSensor(id: SensorId, point: CalibrationPoint): Promise<Result<CalibrationOutcome>> {
    if (pair === null) {
      return { ok: false, error: NOT_INITIALIZED };
    }
    const result = await sensorFor(pair, id).calibrate(point);
    if (!result.ok) {
      return result;
    }
    return { ok: true, value: { sensor: id, point: point, rawValue: result.value } };
  }

  async function tareSensor(id: SensorId, targetPercentage: number = 0): Promise<Result<TareResult>> {
    if (pair === null) {
      return { ok: false, error: NOT_INITIALIZED };
    }
    return sensorFor(pair, id).tare(targetPercentage);
  }

  function getCalibrationValues(): Result<CalibrationValues> {
    if (pair === null) {
      return { ok: false, error: NOT_INITIALIZED };
    }
    return {
      ok: true,
      value: {
        reference: pair.reference.getCalibration(),
        control: pair.control.getCalibration()
      }
    };
  }

  function setCalibrationValues(values: CalibrationValues): Result<void> {
    if (pair === null) {
      return { ok: false, error: NOT_INITIALIZED };
    }
    // Both or neither
    const problem = describeCalibrationProblem(values.reference);
    if (problem !== null) {
      return { ok: false, error: 'reference: ' + problem };
    }
    const controlProblem = describeCalibrationProblem(values.control);
    if (controlProblem !== null) {
      return { ok: false, error: 'control: ' + controlProblem };
    }
    const reference = pair.reference.setCalibration(values.reference);
    return reference.ok ? pair.control.setCalibration(values.control) : reference;
  }

  async function cleanup(): Promise<void> {
    const current = pair;
    if (current === null) {
      return;
    }
    pair = null;
    await closeReader(current.reader);
    logger.info('Sensor resources cleaned up');
  }

  return {
    initialize: initialize,
    isInitialized: function() { return pair !== null; },
    readBoth: readBoth,
    systemHealth: systemHealth,
    calibrateSensor: calibrateSensor,
    tareSensor: tareSensor,
    getCalibrationValues: getCalibrationValues,
    setCalibrationValues: setCalibrationValues,
    cleanup: cleanup
  };
}
