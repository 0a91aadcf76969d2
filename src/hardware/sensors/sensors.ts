/**
 * Water level sensor
 *
 * Averages several conversions per read, converts to a fill percentage
 * through the two-point calibration and feeds the health monitor.
 *
 * Calibration is swapped as a whole immutable profile, so a read running
 * concurrently with calibrate() or tare() uses either the old or the new pair.
 * Sampling holds the channel lock, so two acquisitions on the same channel
 * never interleave.
 */

import type { CalibrationProfile, HealthStatus, Result, SensorReading } from '$types/common';
import { createCalibrationProfile, rawToPercentage, withCalibrationPoint, tareProfile } from '@core/calibration';
import type { CalibrationPoint, TareResult } from '@core/calibration';
import { fmtPercent } from '@logging';
import { roundTo } from '@utils/number';
import type { SensorConfig, SensorDependencies, SensorOptions, WaterLevelSensor } from './types';
import { isUsableSample, needsRecovery } from './helpers';

interface LevelSnapshot {
  readonly raw: number;
  readonly voltage: number;
  readonly percentage: number;
}

const NO_LEVEL: LevelSnapshot = { raw: 0, voltage: 0, percentage: 0 };

/**
 * Create a water level sensor
 *
 * @param options - Identity, channel, starting calibration
 * @param config - Sample counts and delays
 * @param deps - Converter, lock, health monitor, logger, sleep, clock
 * @returns Sensor instance
 *
 * @example
 * ```typescript
 * const reference = createWaterLevelSensor(
 *   { id: 'reference', channel: 0, calibration: { emptyRaw: 50000, fullRaw: 20000 }, autoRecovery: true },
 *   CONFIG,
 *   { reader, lock, health: createHealthMonitor(CONFIG, now), logger, sleep, clock: now }
 * );
 * const level = await reference.readPercentage();
 * ```
 */
export function createWaterLevelSensor(
  options: SensorOptions,
  config: SensorConfig,
  deps: SensorDependencies
): WaterLevelSensor {
  const id = options.id;
  const channel = options.channel;
  const reader = deps.reader;
  const logger = deps.logger;

  let calibration: CalibrationProfile = Object.freeze({
    emptyRaw: options.calibration.emptyRaw,
    fullRaw: options.calibration.fullRaw
  });
  let lastRawValue: number | null = null;
  let lastVoltageValue: number | null = null;
  let lastLevel: LevelSnapshot | null = null;

  /**
   * Take `samples` conversions under the channel lock
   * @returns Usable values, possibly empty
   */
  function acquire(samples: number, read: (ch: number) => Promise<Result<number>>): Promise<number[]> {
    return deps.lock.run(channel, async function() {
      const values: number[] = [];
      for (let i = 0; i < samples; i++) {
        const result = await read(channel);
        if (result.ok && isUsableSample(result.value)) {
          values.push(result.value);
        } else if (!result.ok) {
          logger.debug(id + ': ' + result.error);
        }
        await deps.sleep(config.SAMPLE_DELAY_MS);
      }
      return values;
    });
  }

  async function acquireRaw(samples: number): Promise<Result<number>> {
    const values = await acquire(samples, function(ch) { return reader.readRaw(ch); });
    if (values.length === 0) {
      return { ok: false, error: 'no valid raw samples on channel ' + channel };
    }
    let sum = 0;
    for (const v of values) sum += v;
    return { ok: true, value: Math.trunc(sum / values.length) };
  }

  async function acquireVoltage(samples: number): Promise<Result<number>> {
    const values = await acquire(samples, function(ch) { return reader.readVoltage(ch); });
    if (values.length === 0) {
      return { ok: false, error: 'no valid voltage samples on channel ' + channel };
    }
    let sum = 0;
    for (const v of values) sum += v;
    return { ok: true, value: sum / values.length };
  }

  async function readRaw(samples: number = config.DEFAULT_SAMPLES): Promise<number> {
    const result = await acquireRaw(samples);
    if (!result.ok) return 0;
    lastRawValue = result.value;
    return result.value;
  }

  async function readVoltage(samples: number = config.DEFAULT_SAMPLES): Promise<number> {
    const result = await acquireVoltage(samples);
    if (!result.ok) return 0;
    lastVoltageValue = result.value;
    return result.value;
  }

  /**
   * Pause, then flush the input with a few discarded conversions
   * Failures are logged, never thrown.
   */
  async function attemptRecovery(): Promise<void> {
    logger.info('Attempting auto-recovery for ' + id);
    try {
      await deps.sleep(config.RECOVERY_PAUSE_MS);
      await deps.lock.run(channel, async function() {
        for (let i = 0; i < config.RECOVERY_READS; i++) {
          await reader.readRaw(channel);
          await deps.sleep(config.RECOVERY_READ_DELAY_MS);
        }
      });
      logger.info('Auto-recovery completed for ' + id);
    } catch (err) {
      logger.warning('Auto-recovery failed for ' + id + ': ' + String(err));
    }
  }

  /**
   * Sample raw and voltage together and derive the level from that pair
   *
   * A failed acquisition returns the last consistent snapshot unchanged, so
   * raw, voltage and percentage always come from the same successful read.
   */
  async function sampleLevel(): Promise<LevelSnapshot> {
    const raw = await acquireRaw(config.DEFAULT_SAMPLES);
    const voltage = await acquireVoltage(config.DEFAULT_SAMPLES);

    if (!raw.ok || !voltage.ok) {
      deps.health.recordError();
      const errors: string[] = [];
      if (!raw.ok) errors.push(raw.error);
      if (!voltage.ok) errors.push(voltage.error);
      logger.warning('Error reading ' + id + ': ' + errors.join('; '));
      return lastLevel === null ? NO_LEVEL : lastLevel;
    }

    deps.health.record(voltage.value, raw.value);

    const percentage = rawToPercentage(raw.value, calibration);
    if (percentage === null) {
      logger.warning(id + ': calibration endpoints are equal, reporting 0%');
    }
    const level: LevelSnapshot = {
      raw: raw.value,
      voltage: voltage.value,
      percentage: percentage === null ? 0 : percentage
    };
    lastLevel = level;
    lastRawValue = level.raw;
    lastVoltageValue = level.voltage;

    if (options.autoRecovery) {
      const health = deps.health.check();
      if (needsRecovery(health.status, health.issues)) {
        await attemptRecovery();
      }
    }

    logger.debug(id + ': raw=' + level.raw + ' level=' + fmtPercent(level.percentage));
    return level;
  }

  async function readPercentage(): Promise<number> {
    const level = await sampleLevel();
    return level.percentage;
  }

  async function readLevel(): Promise<SensorReading> {
    const level = await sampleLevel();
    return {
      raw: level.raw,
      voltage: roundTo(level.voltage, 3),
      percentage: level.percentage,
      timestamp: deps.clock()
    };
  }

  async function calibrate(point: CalibrationPoint): Promise<Result<number>> {
    const raw = await acquireRaw(config.CALIBRATION_SAMPLES);
    if (!raw.ok) {
      return raw;
    }

    const next = withCalibrationPoint(calibration, point, raw.value);
    if (!next.ok) {
      logger.warning(id + ': ' + point + ' calibration rejected: ' + next.error);
      return next;
    }

    calibration = next.value;
    logger.info(id + ': ' + (point === 'empty' ? 'Empty' : 'Full') + ' calibration set to ' + raw.value);
    return { ok: true, value: raw.value };
  }

  async function tare(targetPercentage: number = 0): Promise<Result<TareResult>> {
    const raw = await acquireRaw(config.CALIBRATION_SAMPLES);
    if (!raw.ok) {
      return raw;
    }
    const voltage = await readVoltage(config.DEFAULT_SAMPLES);

    const previous = calibration;
    const next = tareProfile(raw.value, previous, targetPercentage);
    if (!next.ok) {
      logger.warning(id + ': tare rejected: ' + next.error);
      return next;
    }

    calibration = next.value;
    logger.info(id + ': tared to ' + fmtPercent(targetPercentage) + ', empty ' + previous.emptyRaw + ' -> ' + next.value.emptyRaw);
    return {
      ok: true,
      value: { oldEmpty: previous.emptyRaw, newEmpty: next.value.emptyRaw, voltage: roundTo(voltage, 3) }
    };
  }

  function getCalibration(): CalibrationProfile {
    return calibration;
  }

  function setCalibration(profile: CalibrationProfile): Result<void> {
    const next = createCalibrationProfile(profile.emptyRaw, profile.fullRaw);
    if (!next.ok) {
      return next;
    }
    if (next.value.emptyRaw !== calibration.emptyRaw || next.value.fullRaw !== calibration.fullRaw) {
      calibration = next.value;
      logger.info(id + ': calibration set to empty ' + next.value.emptyRaw + ', full ' + next.value.fullRaw);
    }
    return { ok: true, value: undefined };
  }

  function healthStatus(): HealthStatus {
    return deps.health.check();
  }

  return {
    id: id,
    channel: channel,
    readRaw: readRaw,
    readVoltage: readVoltage,
    readPercentage: readPercentage,
    readLevel: readLevel,
    calibrate: calibrate,
    tare: tare,
    getCalibration: getCalibration,
    setCalibration: setCalibration,
    healthStatus: healthStatus,
    lastRaw: function() { return lastRawValue; },
    lastVoltage: function() { return lastVoltageValue; }
  };
}
