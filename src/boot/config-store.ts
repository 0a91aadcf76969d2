/**
 * Configuration file and environment loading
 *
 * Precedence: defaults < config.json < environment. Secrets (Slack token and
 * webhook) only ever come from the environment and are never written back.
 * A field that fails validation falls back to its default with a warning;
 * loading never throws.
 *
 * The store remembers the file's mtime and size at its last load or save, so
 * a long-running process can pick up edits made by another one.
 */

import { existsSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { parse as parseDotenv } from 'dotenv';

import type { MonitorUserConfig, Result } from '$types';
import { normalizeSlackChannel, validateConfig } from '@validation';
import CONFIG, { USER_CONFIG } from './config';
import type { ConfigSecrets, ConfigStore, ConfigStoreOptions, LoadedConfig } from './types';

type KeysOfType<T> = {
  [K in keyof MonitorUserConfig]: MonitorUserConfig[K] extends T ? K : never
}[keyof MonitorUserConfig];

const LOG_LEVEL_NAMES: Record<string, number> = { DEBUG: 0, INFO: 1, WARNING: 2, CRITICAL: 3 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isUserConfigKey(key: string): key is keyof MonitorUserConfig {
  return Object.prototype.hasOwnProperty.call(USER_CONFIG, key);
}

/**
 * Copy known fields of a parsed file over the defaults
 * A field of the wrong JSON type keeps its default.
 */
function mergeFileFields(raw: Record<string, unknown>, warnings: string[]): MonitorUserConfig {
  function typeMismatch(key: string, expected: string): void {
    warnings.push('[' + key + ']: expected ' + expected + ', using default');
  }

  function num(key: KeysOfType<number>): number {
    const value = raw[key];
    if (value === undefined) return USER_CONFIG[key];
    if (typeof value !== 'number') {
      typeMismatch(key, 'a number');
      return USER_CONFIG[key];
    }
    return value;
  }

  function bool(key: KeysOfType<boolean>): boolean {
    const value = raw[key];
    if (value === undefined) return USER_CONFIG[key];
    if (typeof value !== 'boolean') {
      typeMismatch(key, 'a boolean');
      return USER_CONFIG[key];
    }
    return value;
  }

  function str(key: Exclude<KeysOfType<string>, 'ADC_DRIVER'>): string {
    const value = raw[key];
    if (value === undefined) return USER_CONFIG[key];
    if (typeof value !== 'string') {
      typeMismatch(key, 'a string');
      return USER_CONFIG[key];
    }
    return value;
  }

  function strings(key: 'SLACK_MENTION_USERS'): readonly string[] {
    const value = raw[key];
    if (value === undefined) return USER_CONFIG[key];
    if (!Array.isArray(value)) {
      typeMismatch(key, 'an array of strings');
      return USER_CONFIG[key];
    }
    const items: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') {
        typeMismatch(key, 'an array of strings');
        return USER_CONFIG[key];
      }
      items.push(item);
    }
    return items;
  }

  function driver(): MonitorUserConfig['ADC_DRIVER'] {
    const value = raw.ADC_DRIVER;
    if (value === undefined) return USER_CONFIG.ADC_DRIVER;
    if (value === 'ads1115' || value === 'simulated') return value;
    typeMismatch('ADC_DRIVER', "'ads1115' or 'simulated'");
    return USER_CONFIG.ADC_DRIVER;
  }

  for (const key of Object.keys(raw)) {
    if (!isUserConfigKey(key)) {
      warnings.push('[' + key + ']: unknown setting, ignored');
    }
  }

  return {
    SAMPLE_INTERVAL_SEC: num('SAMPLE_INTERVAL_SEC'),
    LEAK_THRESHOLD_PERCENT: num('LEAK_THRESHOLD_PERCENT'),
    CONSECUTIVE_READINGS_FOR_ALERT: num('CONSECUTIVE_READINGS_FOR_ALERT'),
    ALERT_COOLDOWN_SEC: num('ALERT_COOLDOWN_SEC'),
    ADC_DRIVER: driver(),
    I2C_BUS: num('I2C_BUS'),
    I2C_ADDRESS: num('I2C_ADDRESS'),
    REFERENCE_CHANNEL: num('REFERENCE_CHANNEL'),
    CONTROL_CHANNEL: num('CONTROL_CHANNEL'),
    REFERENCE_CALIBRATION_EMPTY: num('REFERENCE_CALIBRATION_EMPTY'),
    REFERENCE_CALIBRATION_FULL: num('REFERENCE_CALIBRATION_FULL'),
    CONTROL_CALIBRATION_EMPTY: num('CONTROL_CALIBRATION_EMPTY'),
    CONTROL_CALIBRATION_FULL: num('CONTROL_CALIBRATION_FULL'),
    AUTO_RECOVERY: bool('AUTO_RECOVERY'),
    SIMULATED_REFERENCE_RAW: num('SIMULATED_REFERENCE_RAW'),
    SIMULATED_CONTROL_RAW: num('SIMULATED_CONTROL_RAW'),
    SIMULATED_NOISE_RAW: num('SIMULATED_NOISE_RAW'),
    DATABASE_PATH: str('DATABASE_PATH'),
    DATA_RETENTION_DAYS: num('DATA_RETENTION_DAYS'),
    SLACK_ENABLED: bool('SLACK_ENABLED'),
    SLACK_CHANNEL: str('SLACK_CHANNEL'),
    SLACK_MENTION_USERS: strings('SLACK_MENTION_USERS'),
    SLACK_LOG_LEVEL: num('SLACK_LOG_LEVEL'),
    SLACK_BUFFER_SIZE: num('SLACK_BUFFER_SIZE'),
    SLACK_RETRY_DELAY_SEC: num('SLACK_RETRY_DELAY_SEC'),
    CONSOLE_ENABLED: bool('CONSOLE_ENABLED'),
    CONSOLE_LOG_LEVEL: num('CONSOLE_LOG_LEVEL'),
    LOG_FILE_PATH: str('LOG_FILE_PATH'),
    FILE_LOG_LEVEL: num('FILE_LOG_LEVEL'),
    GLOBAL_LOG_LEVEL: num('GLOBAL_LOG_LEVEL'),
    GLOBAL_LOG_AUTO_DEMOTE_HOURS: num('GLOBAL_LOG_AUTO_DEMOTE_HOURS'),
  };
}

/**
 * Fields that are checked against each other fall back together
 */
function fallbackGroup(field: keyof MonitorUserConfig): Array<keyof MonitorUserConfig> {
  switch (field) {
    case 'REFERENCE_CHANNEL':
    case 'CONTROL_CHANNEL':
      return ['REFERENCE_CHANNEL', 'CONTROL_CHANNEL'];
    case 'REFERENCE_CALIBRATION_EMPTY':
    case 'REFERENCE_CALIBRATION_FULL':
      return ['REFERENCE_CALIBRATION_EMPTY', 'REFERENCE_CALIBRATION_FULL'];
    case 'CONTROL_CALIBRATION_EMPTY':
    case 'CONTROL_CALIBRATION_FULL':
      return ['CONTROL_CALIBRATION_EMPTY', 'CONTROL_CALIBRATION_FULL'];
    default:
      return [field];
  }
}

function withDefault<K extends keyof MonitorUserConfig>(config: MonitorUserConfig, key: K): MonitorUserConfig {
  const next: MonitorUserConfig = { ...config, [key]: USER_CONFIG[key] };
  return next;
}

/**
 * Validate a merged config, replacing every invalid field with its default
 *
 * @param config - Candidate configuration
 * @param warnings - Receives one line per replaced field and per advisory warning
 * @returns A configuration that passes validateConfig()
 */
export function sanitizeUserConfig(config: MonitorUserConfig, warnings: string[]): MonitorUserConfig {
  const result = validateConfig(config);
  result.warnings.forEach(function(warn) {
    warnings.push('[' + warn.field + ']: ' + warn.message);
  });
  if (result.valid) {
    return config;
  }

  let repaired = config;
  result.errors.forEach(function(err) {
    warnings.push('[' + err.field + ']: ' + err.message + ', using default');
    if (!isUserConfigKey(err.field)) return;
    fallbackGroup(err.field).forEach(function(key) {
      repaired = withDefault(repaired, key);
    });
  });

  if (!validateConfig(repaired).valid) {
    warnings.push('Configuration still invalid after field fallback, using defaults');
    return USER_CONFIG;
  }
  return repaired;
}

function parseEnvLogLevel(text: string): number | null {
  const upper = text.trim().toUpperCase();
  if (upper in LOG_LEVEL_NAMES) {
    return LOG_LEVEL_NAMES[upper];
  }
  const value = Number(upper);
  return upper !== '' && Number.isInteger(value) && value >= 0 && value <= 3 ? value : null;
}

/**
 * Create a config store bound to one file
 *
 * @param options - Config path, environment and optional .env file
 *
 * @example
 * ```typescript
 * const store = createConfigStore({ path: 'config.json', envFile: '.env' });
 * const loaded = store.load();
 * loaded.warnings.forEach(function(w) { console.warn(w); });
 * ```
 */
export function createConfigStore(options: ConfigStoreOptions): ConfigStore {
  const env = options.env || process.env;
  let fromFile: MonitorUserConfig = USER_CONFIG;
  let overridden: Array<'DATABASE_PATH' | 'GLOBAL_LOG_LEVEL'> = [];
  let stamp: string | null = null;

  function fileStamp(): string {
    const stats = statSync(options.path, { throwIfNoEntry: false });
    return stats === undefined ? 'missing' : stats.mtimeMs + ':' + stats.size;
  }

  function readFile(warnings: string[]): Record<string, unknown> | null {
    if (!existsSync(options.path)) {
      warnings.push('Config file not found at ' + options.path + ', using defaults');
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(readFileSync(options.path, 'utf8'));
      if (!isRecord(parsed)) {
        warnings.push('Config file ' + options.path + ' must contain a JSON object, using defaults');
        return null;
      }
      return parsed;
    } catch (err) {
      warnings.push('Error loading config from ' + options.path + ': ' + String(err) + ', using defaults');
      return null;
    }
  }

  /**
   * Variables from the .env file; the real environment wins
   */
  function readEnvFile(warnings: string[]): Record<string, string> {
    if (!options.envFile || !existsSync(options.envFile)) {
      return {};
    }
    try {
      return parseDotenv(readFileSync(options.envFile, 'utf8'));
    } catch (err) {
      warnings.push('Error reading ' + options.envFile + ': ' + String(err));
      return {};
    }
  }

  function load(): LoadedConfig {
    const warnings: string[] = [];
    stamp = fileStamp();
    const envFile = readEnvFile(warnings);

    function envValue(name: string): string | undefined {
      const value = env[name];
      return value !== undefined ? value : envFile[name];
    }

    const raw = readFile(warnings);
    const merged = raw === null ? USER_CONFIG : mergeFileFields(raw, warnings);
    const sanitized = sanitizeUserConfig(
      { ...merged, SLACK_CHANNEL: normalizeSlackChannel(merged.SLACK_CHANNEL) },
      warnings
    );
    fromFile = sanitized;
    overridden = [];

    let user: MonitorUserConfig = sanitized;
    const dbPath = envValue('MONITOR_DATABASE_PATH');
    if (dbPath !== undefined && dbPath.trim() !== '') {
      user = { ...user, DATABASE_PATH: dbPath.trim() };
      overridden.push('DATABASE_PATH');
    }
    const levelText = envValue('MONITOR_LOG_LEVEL');
    if (levelText !== undefined) {
      const level = parseEnvLogLevel(levelText);
      if (level === null) {
        warnings.push('[MONITOR_LOG_LEVEL]: invalid level "' + levelText + '", ignored');
      } else {
        user = { ...user, GLOBAL_LOG_LEVEL: level };
        overridden.push('GLOBAL_LOG_LEVEL');
      }
    }

    const secrets: ConfigSecrets = {
      slackBotToken: (envValue('SLACK_BOT_TOKEN') || '').trim(),
      slackWebhookUrl: (envValue('SLACK_WEBHOOK_URL') || '').trim()
    };

    return {
      config: { ...CONFIG, ...user },
      secrets: secrets,
      source: raw === null ? 'defaults' : 'file',
      warnings: warnings
    };
  }

  /**
   * Write the user-tunable part back to the file
   * Environment overrides are written with their file values.
   */
  function save(config: MonitorUserConfig): Result<void> {
    let persisted: MonitorUserConfig = config;
    overridden.forEach(function(key) {
      persisted = key === 'DATABASE_PATH'
        ? { ...persisted, DATABASE_PATH: fromFile.DATABASE_PATH }
        : { ...persisted, GLOBAL_LOG_LEVEL: fromFile.GLOBAL_LOG_LEVEL };
    });

    const out: Record<string, unknown> = {};
    for (const key of Object.keys(USER_CONFIG)) {
      if (isUserConfigKey(key)) {
        out[key] = persisted[key];
      }
    }

    try {
      writeFileSync(options.path, JSON.stringify(out, null, 2) + '\n', 'utf8');
      stamp = fileStamp();
      return { ok: true, value: undefined };
    } catch (err) {
      return { ok: false, error: 'Error saving config to ' + options.path + ': ' + String(err) };
    }
  }

  function reloadIfChanged(): LoadedConfig | null {
    return fileStamp() === stamp ? null : load();
  }

  return {
    path: options.path,
    load: load,
    save: save,
    reloadIfChanged: reloadIfChanged
  };
}
