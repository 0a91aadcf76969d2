/**
 * Monitor service types
 */

import type {
  CombinedReading,
  MonitorConfig,
  MonitorUserConfig,
  Result,
  SensorId,
  SettingsPatch,
  SystemHealth
} from '$types';
import type { CalibrationPoint, TareResult } from '@core/calibration';
import type { LeakPhase } from '@core/leak-detection';
import type { Logger } from '@logging';
import type { Notifier } from '@notifications/types';
import type { ReadingStatistics, ReadingStore, StoredReading } from '@storage';
import type { CalibrationOutcome, DualSensorCoordinator } from '@system/dual-sensor';
import type { SleepFn } from '@utils/time';

export interface MonitorDependencies {
  sensors: DualSensorCoordinator;
  store: ReadingStore;
  notifier: Notifier;
  logger: Logger;
  /** Current time in seconds */
  clock: () => number;
  sleep: SleepFn;
  /** Write the user-tunable configuration back to its file */
  persistConfig: (config: MonitorUserConfig) => Result<void>;
  /** Called after settings were applied, e.g. to reconfigure the notifier */
  onSettingsChanged?: (config: MonitorUserConfig) => void;
  /**
   * Checked before every cycle; returns the configuration when it was changed
   * outside this process, e.g. by a CLI command, and null otherwise
   */
  reloadConfig?: () => MonitorUserConfig | null;
}

export type MonitorSettings = Pick<MonitorUserConfig,
  | 'SAMPLE_INTERVAL_SEC'
  | 'LEAK_THRESHOLD_PERCENT'
  | 'ALERT_COOLDOWN_SEC'
  | 'CONSECUTIVE_READINGS_FOR_ALERT'
>;

export interface MonitorStatus {
  readonly running: boolean;
  readonly sensorsInitialized: boolean;
  readonly consecutiveLeakReadings: number;
  readonly lastAlertTime: number | null;
  readonly leakState: LeakPhase;
  /** null while the sensors are not initialized */
  readonly systemHealth: SystemHealth | null;
  readonly latestReading: StoredReading | null;
  /** Last 24 hours; null when the store could not be read */
  readonly statistics: ReadingStatistics | null;
  readonly activeAlerts: number;
  readonly settings: MonitorSettings;
}

export interface LeakMonitor {
  /** Bring the sensors up; reports a failure once and leaves the monitor degraded */
  initialize(): Promise<boolean>;
  /** Start the sampling loop; false when the sensors are not initialized */
  start(): boolean;
  /** Stop the loop (bounded wait) and release the sensors */
  stop(): Promise<void>;
  /** Run one read, store, leak-check cycle */
  runCycle(): Promise<void>;
  currentReading(): Promise<Result<CombinedReading>>;
  calibrate(id: SensorId, point: CalibrationPoint): Promise<Result<CalibrationOutcome>>;
  tare(id: SensorId, targetPercentage?: number): Promise<Result<TareResult>>;
  updateSettings(patch: SettingsPatch): Result<MonitorUserConfig>;
  status(): MonitorStatus;
  config(): MonitorConfig;
}
