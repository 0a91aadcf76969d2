import type { MonitorUserConfig, MonitorAppConstants, MonitorConfig } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune for sampling,
//   alerting, hardware and observability. Values here are the
//   defaults; config.json and the environment override them.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<MonitorUserConfig> = {
  // SAMPLE_INTERVAL_SEC
  //   Role: Seconds between two sampling cycles of the monitor loop.
  //   Critical: 30–600 s (error if <30 or >600).
  //   Recommended: 60 s; water levels change slowly, more often just fills the database.
  SAMPLE_INTERVAL_SEC: 60,

  // LEAK_THRESHOLD_PERCENT
  //   Role: Absolute reference/control difference (%) above which a reading counts as divergent.
  //   Critical: 1–20 % (error if <1 or >20).
  //   Recommended: 3–10 %; 5 % sits well above eTape noise after averaging.
  LEAK_THRESHOLD_PERCENT: 5.0,

  // CONSECUTIVE_READINGS_FOR_ALERT
  //   Role: Divergent readings in a row required before a leak alert fires (debounce).
  //   Critical: Integer 1–10.
  //   Recommended: 3; one noisy sample must never raise an alert.
  CONSECUTIVE_READINGS_FOR_ALERT: 3,

  // ALERT_COOLDOWN_SEC
  //   Role: Minimum seconds between two leak alerts while a leak persists.
  //   Critical: 300–7200 s (error if <300 or >7200).
  //   Recommended: 3600 s (one reminder per hour).
  ALERT_COOLDOWN_SEC: 3600,

  // ADC_DRIVER
  //   Role: Converter backend: 'ads1115' (I²C hardware) or 'simulated' (bench use).
  //   Critical: One of the two names.
  //   Recommended: 'ads1115' on the device, 'simulated' anywhere else.
  ADC_DRIVER: 'ads1115',

  // I2C_BUS / I2C_ADDRESS
  //   Role: Bus number and 7-bit address of the ADS1115.
  //   Critical: I2C_BUS integer ≥ 0; I2C_ADDRESS one of 0x48–0x4B.
  //   Recommended: Bus 1 and 0x48 (ADDR pin tied to GND) on a Raspberry Pi.
  I2C_BUS: 1,
  I2C_ADDRESS: 0x48,

  // REFERENCE_CHANNEL / CONTROL_CHANNEL
  //   Role: Converter input of the sealed reference sensor and of the monitored sensor.
  //   Critical: Integers 0–3, different from each other.
  //   Recommended: 0 and 1.
  REFERENCE_CHANNEL: 0,
  CONTROL_CHANNEL: 1,

  // REFERENCE_CALIBRATION_EMPTY / REFERENCE_CALIBRATION_FULL
  // CONTROL_CALIBRATION_EMPTY / CONTROL_CALIBRATION_FULL
  //   Role: Raw converter values at empty and full level (linear two-point calibration).
  //   Critical: Integers 0–65535, EMPTY different from FULL.
  //   Recommended: Re-run calibrate/tare on site; eTape gives a higher raw value when empty.
  REFERENCE_CALIBRATION_EMPTY: 50000,
  REFERENCE_CALIBRATION_FULL: 20000,
  CONTROL_CALIBRATION_EMPTY: 50000,
  CONTROL_CALIBRATION_FULL: 20000,

  // AUTO_RECOVERY
  //   Role: Flush a sensor with throwaway reads when its readings look stuck.
  //   Critical: Boolean only.
  //   Recommended: true.
  AUTO_RECOVERY: true,

  // SIMULATED_REFERENCE_RAW / SIMULATED_CONTROL_RAW / SIMULATED_NOISE_RAW
  //   Role: Steady raw level per channel and ± noise amplitude of the simulated converter.
  //   Critical: Integers 0–65535; only read when ADC_DRIVER = 'simulated'.
  //   Recommended: Noise of a few dozen counts keeps the stuck-reading check quiet.
  SIMULATED_REFERENCE_RAW: 35000,
  SIMULATED_CONTROL_RAW: 35000,
  SIMULATED_NOISE_RAW: 40,

  // DATABASE_PATH
  //   Role: SQLite file holding readings and alerts.
  //   Critical: Non-empty path, writable by the service user.
  //   Recommended: 'readings.db' next to config.json.
  DATABASE_PATH: 'readings.db',

  // DATA_RETENTION_DAYS
  //   Role: Readings (and acknowledged alerts) older than this are purged once a day.
  //   Critical: Integer 1–3650.
  //   Recommended: 30 days.
  DATA_RETENTION_DAYS: 30,

  // SLACK_ENABLED
  //   Role: Master switch for Slack leak/system notifications.
  //   Critical: Boolean only; needs SLACK_BOT_TOKEN in the environment.
  //   Recommended: true when remote monitoring is desired.
  SLACK_ENABLED: false,

  // SLACK_CHANNEL
  //   Role: Channel that receives notifications.
  //   Critical: Non-empty; a leading '#' is added when missing.
  //   Recommended: A dedicated alerts channel.
  SLACK_CHANNEL: '#alerts',

  // SLACK_MENTION_USERS
  //   Role: Mentions prepended to leak alerts (e.g. '@here', '<@U123>').
  //   Critical: Array of strings.
  //   Recommended: Whoever can shut off the water.
  SLACK_MENTION_USERS: [],

  // SLACK_LOG_LEVEL
  //   Role: Minimum log severity forwarded to the Slack webhook (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 2 (WARNING); INFO is too chatty for a channel.
  SLACK_LOG_LEVEL: 2,

  // SLACK_BUFFER_SIZE
  //   Role: Maximum queued log messages while the webhook is unreachable.
  //   Critical: Integer 1–100.
  //   Recommended: 10–20.
  SLACK_BUFFER_SIZE: 10,

  // SLACK_RETRY_DELAY_SEC
  //   Role: Initial retry delay for failed webhook posts (doubles per attempt, capped at 60 s).
  //   Critical: 1–60 s.
  //   Recommended: 5 s.
  SLACK_RETRY_DELAY_SEC: 5,

  // CONSOLE_ENABLED / CONSOLE_LOG_LEVEL
  //   Role: Console output and its minimum severity.
  //   Critical: Boolean; level one of the LOG_LEVELS values.
  //   Recommended: Enabled at 1 (INFO); journald captures it under systemd.
  CONSOLE_ENABLED: true,
  CONSOLE_LOG_LEVEL: 1,

  // LOG_FILE_PATH / FILE_LOG_LEVEL
  //   Role: Append-only log file ('' disables) and its minimum severity.
  //   Critical: Writable path; level one of the LOG_LEVELS values.
  //   Recommended: 'water_monitor.log' at 1 (INFO).
  LOG_FILE_PATH: 'water_monitor.log',
  FILE_LOG_LEVEL: 1,

  // GLOBAL_LOG_LEVEL
  //   Role: Minimum severity the logger processes at all (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO); use --debug on the command line for DEBUG.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Uptime (h) after which INFO logs are suppressed (0 disables).
  //   Critical: 0–168 h.
  //   Recommended: 0 on a Pi with log rotation; 24 on constrained storage.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 0,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal engine constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<MonitorAppConstants> = {
  // ═══════════════════════════════════════════════════════════════
  // LOGGING CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // LOG_LEVELS
  //   Role: Numeric log levels used by the logger and sinks.
  //   Critical: Must stay ordered DEBUG < INFO < WARNING < CRITICAL.
  //   Recommended: Do not change.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // ═══════════════════════════════════════════════════════════════
  // ACQUISITION CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // DEFAULT_SAMPLES / CALIBRATION_SAMPLES
  //   Role: Converter reads averaged per reading, and per calibration point.
  //   Critical: Positive integers.
  //   Recommended: 10 and 50; calibration deserves the extra averaging.
  DEFAULT_SAMPLES: 10,
  CALIBRATION_SAMPLES: 50,

  // SAMPLE_DELAY_MS
  //   Role: Pause between two reads of the same channel.
  //   Critical: Longer than one ADS1115 conversion at 128 SPS (~8 ms).
  //   Recommended: 10 ms.
  SAMPLE_DELAY_MS: 10,

  // ═══════════════════════════════════════════════════════════════
  // HEALTH CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // HISTORY_CAPACITY
  //   Role: Voltage and raw samples kept per sensor for health analysis.
  //   Critical: ≥ every window below.
  //   Recommended: 100.
  HISTORY_CAPACITY: 100,

  // ERROR_STREAK_LIMIT
  //   Role: Consecutive failed reads tolerated before a sensor is marked failed.
  //   Critical: Positive integer.
  //   Recommended: 5.
  ERROR_STREAK_LIMIT: 5,

  // VOLTAGE_WINDOW / VOLTAGE_RANGE_MAX_V / VOLTAGE_MIN_V / VOLTAGE_MAX_V
  //   Role: Voltage-stability check: last N samples, max spread, plausible mean band.
  //   Critical: VOLTAGE_MIN_V < VOLTAGE_MAX_V within the converter's ±4.096 V range.
  //   Recommended: 10 samples, 0.5 V spread, 0.1–3.2 V on a 3.3 V divider.
  VOLTAGE_WINDOW: 10,
  VOLTAGE_RANGE_MAX_V: 0.5,
  VOLTAGE_MIN_V: 0.1,
  VOLTAGE_MAX_V: 3.2,

  // DRIFT_CHECK_INTERVAL_SEC / DRIFT_MIN_HISTORY
  //   Role: Calibration-drift check runs at most once per interval, once enough history exists.
  //   Critical: Interval ≥ DRIFT_OLD_AGE_SEC.
  //   Recommended: 24 h and 50 samples.
  DRIFT_CHECK_INTERVAL_SEC: 86400,
  DRIFT_MIN_HISTORY: 50,

  // DRIFT_OLD_AGE_SEC / DRIFT_RECENT_AGE_SEC / DRIFT_MIN_SAMPLES / DRIFT_MAX_V
  //   Role: Compare mean voltage older than 23 h with the last hour's mean.
  //   Critical: DRIFT_RECENT_AGE_SEC < DRIFT_OLD_AGE_SEC.
  //   Recommended: Flag more than 0.2 V with at least 5 samples per window.
  DRIFT_OLD_AGE_SEC: 82800,
  DRIFT_RECENT_AGE_SEC: 3600,
  DRIFT_MIN_SAMPLES: 5,
  DRIFT_MAX_V: 0.2,

  // STUCK_WINDOW / STUCK_MIN_UNIQUE
  //   Role: Stuck-reading check: fewer than N distinct raw values in the last window.
  //   Critical: STUCK_MIN_UNIQUE ≤ STUCK_WINDOW.
  //   Recommended: 3 distinct values in 20 readings.
  STUCK_WINDOW: 20,
  STUCK_MIN_UNIQUE: 3,

  // STABILITY_WINDOW / STABILITY_MIN_SAMPLES / STABILITY_NEUTRAL_SCORE
  //   Role: Stability score = max(0, 100 - range·100) over the last N voltages.
  //   Critical: Neutral score reported while fewer than STABILITY_MIN_SAMPLES exist.
  //   Recommended: 20, 5 and 50.
  STABILITY_WINDOW: 20,
  STABILITY_MIN_SAMPLES: 5,
  STABILITY_NEUTRAL_SCORE: 50,

  // ═══════════════════════════════════════════════════════════════
  // RECOVERY CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // RECOVERY_PAUSE_MS / RECOVERY_READS / RECOVERY_READ_DELAY_MS
  //   Role: Stuck-sensor recovery: pause, then discard several throwaway reads.
  //   Critical: Bounded; recovery runs inside a sampling cycle.
  //   Recommended: 2 s pause, 5 reads 100 ms apart.
  RECOVERY_PAUSE_MS: 2000,
  RECOVERY_READS: 5,
  RECOVERY_READ_DELAY_MS: 100,

  // ═══════════════════════════════════════════════════════════════
  // LOOP CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // LOOP_ERROR_BACKOFF_MS
  //   Role: Pause after a failed cycle before the next attempt.
  //   Critical: Much shorter than SAMPLE_INTERVAL_SEC.
  //   Recommended: 5 s.
  LOOP_ERROR_BACKOFF_MS: 5000,

  // STOP_TIMEOUT_MS
  //   Role: Longest stop() waits for the running cycle to finish.
  //   Critical: Positive.
  //   Recommended: 5 s.
  STOP_TIMEOUT_MS: 5000,

  // CLEANUP_INTERVAL_SEC
  //   Role: Minimum time between two retention cleanups run from the loop.
  //   Critical: Positive.
  //   Recommended: 24 h.
  CLEANUP_INTERVAL_SEC: 86400,

  // ═══════════════════════════════════════════════════════════════
  // COORDINATOR CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // STATUS_LEAK_THRESHOLD_PERCENT
  //   Role: Difference at which a combined reading is labelled 'leak_detected'.
  //   Critical: Informational only; alerting uses LEAK_THRESHOLD_PERCENT.
  //   Recommended: 5 %.
  STATUS_LEAK_THRESHOLD_PERCENT: 5.0,
};

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
//   Defaults only; the loaded configuration comes from config-store
// ─────────────────────────────────────────────────────────────

const CONFIG: MonitorConfig = { ...APP_CONSTANTS, ...USER_CONFIG };

export default CONFIG;
