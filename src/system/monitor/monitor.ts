/**
 * Leak monitor service
 *
 * Owns the sampling loop: read both sensors, store the reading, run the leak
 * check, sleep. Cycles never overlap. A failing cycle is logged and followed
 * by a fixed backoff; nothing here terminates the process.
 *
 * Settings and calibration saved to the config file by another process are
 * picked up at the start of the next cycle.
 */

import type {
  CombinedReading,
  HealthState,
  MonitorConfig,
  MonitorUserConfig,
  Result,
  SensorId,
  SettingsPatch
} from '$types';
import type { CalibrationPoint, TareResult } from '@core/calibration';
import { createAlertDispatcher } from '@features/alert-dispatch';
import type { CalibrationOutcome } from '@system/dual-sensor';
import { normalizeSlackChannel, validateSettingsPatch } from '@validation';
import type { ReadingStatistics, StoredReading } from '@storage';
import type { LeakMonitor, MonitorDependencies, MonitorStatus } from './types';
import {
  HEALTH_ALERT_KIND,
  INIT_FAILURE_KIND,
  calibrationValuesOf,
  changedSettingKeys,
  describeHealthChange,
  formatReadingSummary,
  isCleanupDue,
  pickRuntimeSettings,
  pickSettings,
  sameCalibration,
  withSensorCalibration
} from './helpers';

/**
 * Create the monitor service
 *
 * @param initialConfig - Loaded configuration
 * @param deps - Sensors, store, notifier, logger, clock, sleep and config persistence
 *
 * @example
 * ```typescript
 * const monitor = createLeakMonitor(loaded.config, deps);
 * if (await monitor.initialize()) {
 *   monitor.start();
 * }
 * process.on('SIGINT', function() { void monitor.stop(); });
 * ```
 */
export function createLeakMonitor(initialConfig: MonitorConfig, deps: MonitorDependencies): LeakMonitor {
  const logger = deps.logger;
  const sensors = deps.sensors;
  const store = deps.store;
  const dispatcher = createAlertDispatcher({
    store: store,
    notifier: deps.notifier,
    logger: logger,
    clock: deps.clock
  });

  let config: MonitorConfig = initialConfig;
  let running = false;
  let abort: AbortController | null = null;
  let loopDone: Promise<void> | null = null;
  let initFailureReported = false;
  let lastHealth: HealthState = 'healthy';
  let lastCleanup: number | null = null;

  async function initialize(): Promise<boolean> {
    const result = await sensors.initialize();
    if (result.ok) {
      return true;
    }

    logger.critical('Sensors unavailable, continuing in degraded mode');
    if (!initFailureReported) {
      initFailureReported = true;
      await deps.notifier.notifySystem(INIT_FAILURE_KIND, result.error);
    }
    return false;
  }

  /**
   * Notify when the combined health moves into or out of a bad state
   */
  async function checkHealthTransition(): Promise<void> {
    const health = sensors.systemHealth();
    if (!health.ok) {
      return;
    }
    const next = health.value.systemStatus;
    const previous = lastHealth;
    if (next === previous) {
      return;
    }
    lastHealth = next;

    if (next === 'healthy') {
      logger.info('Sensor health recovered');
      await deps.notifier.notifyRecovery('All sensors are healthy again');
      return;
    }

    const message = describeHealthChange(previous, health.value);
    logger.warning(message);
    await deps.notifier.notifySystem(HEALTH_ALERT_KIND, message);
  }

  function runCleanupIfDue(): void {
    const nowSec = deps.clock();
    if (!isCleanupDue(lastCleanup, nowSec, config.CLEANUP_INTERVAL_SEC)) {
      return;
    }
    lastCleanup = nowSec;

    try {
      const removed = store.cleanupOldData(config.DATA_RETENTION_DAYS);
      if (removed.readingsDeleted > 0 || removed.alertsDeleted > 0) {
        logger.info('Removed ' + removed.readingsDeleted + ' readings and ' + removed.alertsDeleted +
          ' alerts older than ' + config.DATA_RETENTION_DAYS + ' days');
      }
    } catch (err) {
      logger.warning('Data cleanup failed: ' + String(err));
    }
  }

  /**
   * Take over a configuration another process wrote; nothing is saved back
   */
  function applyExternalConfig(next: MonitorUserConfig): void {
    const changed = changedSettingKeys(config, next);
    if (changed.length > 0) {
      config = { ...config, ...pickRuntimeSettings(next) };
      if (deps.onSettingsChanged) {
        deps.onSettingsChanged(config);
      }
      logger.info('Settings reloaded: ' + changed.join(', '));
    }

    if (!sameCalibration(config, next)) {
      const values = calibrationValuesOf(next);
      const applied = sensors.setCalibrationValues(values);
      if (!applied.ok) {
        logger.warning('Reloaded calibration not applied: ' + applied.error);
        return;
      }
      config = {
        ...config,
        ...withSensorCalibration(withSensorCalibration(config, 'reference', values.reference), 'control', values.control)
      };
      logger.info('Calibration reloaded');
    }
  }

  function reloadIfChanged(): void {
    if (!deps.reloadConfig) {
      return;
    }
    const next = deps.reloadConfig();
    if (next !== null) {
      applyExternalConfig(next);
    }
  }

  async function runCycle(): Promise<void> {
    reloadIfChanged();
    const result = await sensors.readBoth();

    if (result.ok) {
      store.storeReading(result.value);
      await dispatcher.process(result.value, config);
      logger.debug('Reading stored: ' + formatReadingSummary(result.value));
    } else {
      logger.warning('Sensor read error: ' + result.error);
    }

    await checkHealthTransition();
    runCleanupIfDue();
  }

  async function loop(signal: AbortSignal): Promise<void> {
    logger.info('Monitoring loop started');

    while (running) {
      try {
        await runCycle();
        await deps.sleep(config.SAMPLE_INTERVAL_SEC * 1000, signal);
      } catch (err) {
        logger.critical('Monitor loop error: ' + String(err));
        await deps.sleep(config.LOOP_ERROR_BACKOFF_MS, signal);
      }
    }

    logger.info('Monitoring loop stopped');
  }

  function start(): boolean {
    if (!sensors.isInitialized()) {
      logger.warning('Sensors not initialized, monitoring loop will not run');
      return false;
    }
    if (running) {
      return true;
    }

    running = true;
    const controller = new AbortController();
    abort = controller;
    loopDone = loop(controller.signal).catch(function(err: unknown) {
      running = false;
      logger.critical('Monitoring loop terminated: ' + String(err));
    });
    logger.info('Water monitoring started (every ' + config.SAMPLE_INTERVAL_SEC + 's)');
    return true;
  }

  async function stop(): Promise<void> {
    running = false;
    if (abort !== null) {
      abort.abort();
      abort = null;
    }

    const pending = loopDone;
    loopDone = null;
    if (pending !== null) {
      const timeout = new AbortController();
      const finished = await Promise.race([
        pending.then(function() { return true; }),
        deps.sleep(config.STOP_TIMEOUT_MS, timeout.signal).then(function() { return false; })
      ]);
      timeout.abort();
      if (!finished) {
        logger.warning('Monitoring loop did not stop within ' + config.STOP_TIMEOUT_MS + ' ms');
      }
    }

    await sensors.cleanup();
    logger.info('Water monitoring stopped');
  }

  function persist(next: MonitorUserConfig): void {
    const saved = deps.persistConfig(next);
    if (!saved.ok) {
      logger.warning(saved.error);
    }
  }

  function persistCalibration(id: SensorId): void {
    const values = sensors.getCalibrationValues();
    if (!values.ok) {
      return;
    }
    config = { ...config, ...withSensorCalibration(config, id, values.value[id]) };
    persist(config);
  }

  async function calibrate(id: SensorId, point: CalibrationPoint): Promise<Result<CalibrationOutcome>> {
    const result = await sensors.calibrateSensor(id, point);
    if (result.ok) {
      persistCalibration(id);
    }
    return result;
  }

  async function tare(id: SensorId, targetPercentage: number = 0): Promise<Result<TareResult>> {
    const result = await sensors.tareSensor(id, targetPercentage);
    if (result.ok) {
      persistCalibration(id);
    }
    return result;
  }

  function updateSettings(patch: SettingsPatch): Result<MonitorUserConfig> {
    const normalized: SettingsPatch = patch.SLACK_CHANNEL === undefined
      ? patch
      : { ...patch, SLACK_CHANNEL: normalizeSlackChannel(patch.SLACK_CHANNEL) };

    const validation = validateSettingsPatch(normalized);
    if (!validation.valid) {
      const error = validation.errors.map(function(e) { return e.message; }).join('; ');
      logger.warning('Settings rejected: ' + error);
      return { ok: false, error: error };
    }
    validation.warnings.forEach(function(w) {
      logger.warning('[' + w.field + ']: ' + w.message);
    });

    config = { ...config, ...normalized };
    persist(config);
    if (deps.onSettingsChanged) {
      deps.onSettingsChanged(config);
    }
    logger.info('Settings updated: ' + Object.keys(normalized).join(', '));
    return { ok: true, value: config };
  }

  function readStore<T>(what: string, read: () => T, fallback: T): T {
    try {
      return read();
    } catch (err) {
      logger.warning('Could not read ' + what + ': ' + String(err));
      return fallback;
    }
  }

  function status(): MonitorStatus {
    const leak = dispatcher.state();
    const health = sensors.systemHealth();
    const latest = readStore<StoredReading | null>('latest reading', function() { return store.latestReading(); }, null);
    const statistics = readStore<ReadingStatistics | null>('statistics', function() { return store.getStatistics(24); }, null);
    const activeAlerts = readStore('active alerts', function() { return store.getActiveAlerts().length; }, 0);

    return {
      running: running,
      sensorsInitialized: sensors.isInitialized(),
      consecutiveLeakReadings: leak.consecutiveLeakReadings,
      lastAlertTime: leak.lastAlertTime,
      leakState: dispatcher.phase(config),
      systemHealth: health.ok ? health.value : null,
      latestReading: latest,
      statistics: statistics,
      activeAlerts: activeAlerts,
      settings: pickSettings(config)
    };
  }

  function currentReading(): Promise<Result<CombinedReading>> {
    return sensors.readBoth();
  }

  return {
    initialize: initialize,
    start: start,
    stop: stop,
    runCycle: runCycle,
    currentReading: currentReading,
    calibrate: calibrate,
    tare: tare,
    updateSettings: updateSettings,
    status: status,
    config: function() { return config; }
  };
}
