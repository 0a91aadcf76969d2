/**
 * Engine initialization
 *
 * Loads the configuration, builds the logger and its sinks, opens the
 * database and wires sensors, notifier and monitor together. Sensors are not
 * brought up here: monitor.initialize() does that and may leave the engine
 * running degraded.
 */

import { resolve } from 'node:path';

import { InitializationError } from '$types';
import type { MonitorConfig, SensorId } from '$types';
import { createAds1115Reader, createChannelLock, createSimulatedReader, isValidChannel } from '@hardware/adc';
import type { AnalogReader } from '@hardware/adc';
import { createWaterLevelSensor } from '@hardware/sensors';
import type { WaterLevelSensor } from '@hardware/sensors';
import { createHealthMonitor } from '@core/sensor-health';
import {
  createConsoleSink,
  createFileSink,
  createLogger,
  createNodeTimerApi,
  createSlackSink,
  toLogLevel
} from '@logging';
import type { Logger, SinkWithLevel } from '@logging';
import { createSlackNotifier } from '@notifications/slack';
import { createSqliteStore } from '@storage';
import type { ReadingStore } from '@storage';
import { createDualSensorCoordinator } from '@system/dual-sensor';
import { createLeakMonitor } from '@system/monitor';
import { now, sleep as defaultSleep } from '@utils/time';
import { createConfigStore } from './config-store';
import type { ConfigSecrets, Engine, InitOptions } from './types';

const SLACK_TIMEOUT_MS = 10000;
const SLACK_LOG_MAX_RETRIES = 5;

/**
 * --debug lowers the logger and the console to DEBUG without touching the
 * configuration that gets saved back
 */
function buildSinks(config: MonitorConfig, secrets: ConfigSecrets, options: InitOptions, clock: () => number): SinkWithLevel[] {
  const consoleApi = options.consoleApi || console;
  const sinks: SinkWithLevel[] = [];

  if (config.CONSOLE_ENABLED || options.debug === true) {
    sinks.push({
      sink: createConsoleSink(consoleApi, { colors: options.consoleApi === undefined, timestamps: true }, clock),
      minLevel: options.debug === true ? 0 : toLogLevel(config.CONSOLE_LOG_LEVEL, 1)
    });
  }
  if (config.LOG_FILE_PATH !== '') {
    sinks.push({
      sink: createFileSink({ path: resolve(config.LOG_FILE_PATH) }, clock, consoleApi),
      minLevel: toLogLevel(config.FILE_LOG_LEVEL, 1)
    });
  }
  if (config.SLACK_ENABLED && secrets.slackWebhookUrl !== '') {
    sinks.push({
      sink: createSlackSink(options.fetchApi || fetch, createNodeTimerApi(), {
        enabled: true,
        webhookUrl: secrets.slackWebhookUrl,
        bufferSize: config.SLACK_BUFFER_SIZE,
        retryDelayMs: config.SLACK_RETRY_DELAY_SEC * 1000,
        maxRetries: SLACK_LOG_MAX_RETRIES
      }, consoleApi),
      minLevel: toLogLevel(config.SLACK_LOG_LEVEL, 2)
    });
  }
  return sinks;
}

function openStore(config: MonitorConfig, logger: Logger, clock: () => number): ReadingStore {
  const path = config.DATABASE_PATH === ':memory:' ? ':memory:' : resolve(config.DATABASE_PATH);
  try {
    const store = createSqliteStore(path, clock);
    logger.info('Database ready at ' + path);
    return store;
  } catch (err) {
    throw new InitializationError('Cannot open database ' + path + ': ' + String(err));
  }
}

function openConfiguredReader(config: MonitorConfig): Promise<AnalogReader> {
  if (config.ADC_DRIVER === 'simulated') {
    const levels: Record<number, number> = {};
    levels[config.REFERENCE_CHANNEL] = config.SIMULATED_REFERENCE_RAW;
    levels[config.CONTROL_CHANNEL] = config.SIMULATED_CONTROL_RAW;
    return Promise.resolve(createSimulatedReader({ levels: levels, noise: config.SIMULATED_NOISE_RAW }));
  }
  return createAds1115Reader({ busNumber: config.I2C_BUS, address: config.I2C_ADDRESS });
}

/**
 * Build the whole engine from a config file
 *
 * @param options - Config path, environment and test overrides
 * @returns The assembled engine; sensors still need monitor.initialize()
 * @throws InitializationError when the database cannot be opened
 */
export async function initialize(options: InitOptions): Promise<Engine> {
  const clock = options.clock || now;
  const sleep = options.sleep || defaultSleep;

  const configStore = createConfigStore({ path: options.configPath, env: options.env, envFile: options.envFile });
  const loaded = configStore.load();
  const config = loaded.config;

  const logger = createLogger({
    level: options.debug === true ? 0 : toLogLevel(config.GLOBAL_LOG_LEVEL, 1),
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: clock,
    sinks: buildSinks(config, loaded.secrets, options, clock),
    fallback: options.consoleApi
  }, config.LOG_LEVELS);

  const messages = await logger.initialize();
  logger.info('💧 Water leak monitor starting');
  logger.info('⚙️ Config ' + configStore.path + ' (' + loaded.source + ') | driver ' + config.ADC_DRIVER +
    ' | every ' + config.SAMPLE_INTERVAL_SEC + 's | threshold ' + config.LEAK_THRESHOLD_PERCENT + '% x' +
    config.CONSECUTIVE_READINGS_FOR_ALERT);
  messages.forEach(function(msg) {
    if (!msg.success) {
      logger.warning(msg.message);
    }
  });
  loaded.warnings.forEach(function(warning) {
    logger.warning(warning);
  });

  let store: ReadingStore;
  try {
    store = openStore(config, logger, clock);
  } catch (err) {
    logger.critical(String(err));
    await logger.close();
    throw err;
  }

  const notifier = createSlackNotifier({
    enabled: config.SLACK_ENABLED,
    botToken: loaded.secrets.slackBotToken,
    channel: config.SLACK_CHANNEL,
    mentionUsers: config.SLACK_MENTION_USERS,
    timeoutMs: SLACK_TIMEOUT_MS
  }, options.fetchApi || fetch, logger, clock);

  const lock = createChannelLock();

  function createSensor(id: SensorId, reader: AnalogReader): WaterLevelSensor {
    const reference = id === 'reference';
    const channel = reference ? config.REFERENCE_CHANNEL : config.CONTROL_CHANNEL;
    if (!isValidChannel(channel)) {
      throw new InitializationError(id + ' sensor channel must be 0-3 (got ' + channel + ')');
    }
    return createWaterLevelSensor({
      id: id,
      channel: channel,
      calibration: reference
        ? { emptyRaw: config.REFERENCE_CALIBRATION_EMPTY, fullRaw: config.REFERENCE_CALIBRATION_FULL }
        : { emptyRaw: config.CONTROL_CALIBRATION_EMPTY, fullRaw: config.CONTROL_CALIBRATION_FULL },
      autoRecovery: config.AUTO_RECOVERY
    }, config, {
      reader: reader,
      lock: lock,
      health: createHealthMonitor(config, clock),
      logger: logger,
      sleep: sleep,
      clock: clock
    });
  }

  const sensors = createDualSensorCoordinator(config, {
    openReader: options.openReader || function() { return openConfiguredReader(config); },
    createSensor: createSensor,
    logger: logger,
    clock: clock
  });

  const monitor = createLeakMonitor(config, {
    sensors: sensors,
    store: store,
    notifier: notifier,
    logger: logger,
    clock: clock,
    sleep: sleep,
    persistConfig: configStore.save,
    reloadConfig: function() {
      const reloaded = configStore.reloadIfChanged();
      if (reloaded === null) {
        return null;
      }
      logger.info('Config file ' + configStore.path + ' changed, reloading');
      reloaded.warnings.forEach(function(warning) {
        logger.warning(warning);
      });
      return reloaded.config;
    },
    onSettingsChanged: function(next) {
      notifier.reconfigure({
        enabled: next.SLACK_ENABLED,
        channel: next.SLACK_CHANNEL,
        mentionUsers: next.SLACK_MENTION_USERS
      });
    }
  });

  async function shutdown(): Promise<void> {
    await monitor.stop();
    store.close();
    logger.info('Shutdown complete');
    await logger.close();
  }

  return {
    config: config,
    logger: logger,
    store: store,
    notifier: notifier,
    sensors: sensors,
    monitor: monitor,
    configStore: configStore,
    shutdown: shutdown
  };
}
