import type { MonitorUserConfig, SettingsPatch } from '$types';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';
import {
  addError,
  addWarning,
  validateBoolean,
  validateIntegerRange,
  validateLogLevel,
  validateNonEmptyString,
  validateNumberRange,
  validateOneOf,
  validateStringArray
} from './helpers';

const ADC_DRIVERS = ['ads1115', 'simulated'];

/**
 * Range checks shared by the full config and by runtime settings patches
 */
function validateRuntimeSettings(
  settings: SettingsPatch,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  validateIntegerRange(settings.SAMPLE_INTERVAL_SEC, 'SAMPLE_INTERVAL_SEC', 30, 600, errors, warnings, 60, 300);
  validateNumberRange(settings.LEAK_THRESHOLD_PERCENT, 'LEAK_THRESHOLD_PERCENT', 1, 20, errors, warnings, 3, 10);
  validateIntegerRange(settings.ALERT_COOLDOWN_SEC, 'ALERT_COOLDOWN_SEC', 300, 7200, errors, warnings, 900, 7200);
  validateIntegerRange(
    settings.CONSECUTIVE_READINGS_FOR_ALERT,
    'CONSECUTIVE_READINGS_FOR_ALERT',
    1,
    10,
    errors,
    warnings,
    2,
    5
  );
  validateBoolean(settings.SLACK_ENABLED, 'SLACK_ENABLED', errors);
  validateNonEmptyString(settings.SLACK_CHANNEL, 'SLACK_CHANNEL', errors);
  validateStringArray(settings.SLACK_MENTION_USERS, 'SLACK_MENTION_USERS', errors);
}

function validateCalibrationPair(
  emptyRaw: number,
  fullRaw: number,
  prefix: string,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  const before = errors.length;
  validateIntegerRange(emptyRaw, prefix + '_EMPTY', 0, 65535, errors, warnings);
  validateIntegerRange(fullRaw, prefix + '_FULL', 0, 65535, errors, warnings);

  if (errors.length === before && emptyRaw === fullRaw) {
    addError(errors, prefix + '_FULL', prefix + '_FULL must differ from ' + prefix + '_EMPTY (both ' + fullRaw + ')');
  }
}

/**
 * Validate a complete user configuration
 *
 * Errors name the offending field so the loader can fall back to that
 * field's default; warnings are advisory only.
 */
export function validateConfig(config: MonitorUserConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // Sampling and leak detection
  validateRuntimeSettings(config, errors, warnings);

  if (config.ALERT_COOLDOWN_SEC < config.SAMPLE_INTERVAL_SEC * config.CONSECUTIVE_READINGS_FOR_ALERT) {
    addWarning(
      warnings,
      'ALERT_COOLDOWN_SEC',
      'ALERT_COOLDOWN_SEC is shorter than the time needed to confirm a leak; every confirmation will alert'
    );
  }

  // Hardware
  validateOneOf(config.ADC_DRIVER, 'ADC_DRIVER', ADC_DRIVERS, errors);
  validateIntegerRange(config.I2C_BUS, 'I2C_BUS', 0, 255, errors, warnings);
  validateIntegerRange(config.I2C_ADDRESS, 'I2C_ADDRESS', 0x48, 0x4b, errors, warnings);
  validateIntegerRange(config.REFERENCE_CHANNEL, 'REFERENCE_CHANNEL', 0, 3, errors, warnings);
  validateIntegerRange(config.CONTROL_CHANNEL, 'CONTROL_CHANNEL', 0, 3, errors, warnings);
  if (config.REFERENCE_CHANNEL === config.CONTROL_CHANNEL) {
    addError(errors, 'CONTROL_CHANNEL', 'CONTROL_CHANNEL must differ from REFERENCE_CHANNEL');
  }

  // Calibration
  validateCalibrationPair(
    config.REFERENCE_CALIBRATION_EMPTY,
    config.REFERENCE_CALIBRATION_FULL,
    'REFERENCE_CALIBRATION',
    errors,
    warnings
  );
  validateCalibrationPair(
    config.CONTROL_CALIBRATION_EMPTY,
    config.CONTROL_CALIBRATION_FULL,
    'CONTROL_CALIBRATION',
    errors,
    warnings
  );
  validateBoolean(config.AUTO_RECOVERY, 'AUTO_RECOVERY', errors);

  // Simulated converter
  validateIntegerRange(config.SIMULATED_REFERENCE_RAW, 'SIMULATED_REFERENCE_RAW', 0, 65535, errors, warnings);
  validateIntegerRange(config.SIMULATED_CONTROL_RAW, 'SIMULATED_CONTROL_RAW', 0, 65535, errors, warnings);
  validateIntegerRange(config.SIMULATED_NOISE_RAW, 'SIMULATED_NOISE_RAW', 0, 5000, errors, warnings);

  // Storage
  validateNonEmptyString(config.DATABASE_PATH, 'DATABASE_PATH', errors);
  validateIntegerRange(config.DATA_RETENTION_DAYS, 'DATA_RETENTION_DAYS', 1, 3650, errors, warnings, 7, 365);

  // Logging
  validateLogLevel(config.SLACK_LOG_LEVEL, 'SLACK_LOG_LEVEL', errors, warnings);
  validateIntegerRange(config.SLACK_BUFFER_SIZE, 'SLACK_BUFFER_SIZE', 1, 100, errors, warnings);
  validateNumberRange(config.SLACK_RETRY_DELAY_SEC, 'SLACK_RETRY_DELAY_SEC', 1, 60, errors, warnings);
  validateBoolean(config.CONSOLE_ENABLED, 'CONSOLE_ENABLED', errors);
  validateLogLevel(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', errors, warnings);
  if (typeof config.LOG_FILE_PATH !== 'string') {
    addError(errors, 'LOG_FILE_PATH', 'LOG_FILE_PATH must be a string');
  }
  validateLogLevel(config.FILE_LOG_LEVEL, 'FILE_LOG_LEVEL', errors, warnings);
  validateLogLevel(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', errors, warnings);
  validateNumberRange(config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', 0, 168, errors, warnings);

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}

/**
 * Validate a partial settings update before it is applied
 *
 * Only the fields present in the patch are checked.
 */
export function validateSettingsPatch(patch: SettingsPatch): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateRuntimeSettings(patch, errors, warnings);

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}
