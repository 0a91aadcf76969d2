export type {
  SensorId,
  CalibrationProfile,
  SensorReading,
  ReadingStatus,
  CombinedReading,
  AlertRecord,
  HealthState,
  HealthStatus,
  SystemHealth,
  Result
} from './common';
export type {
  AdcDriverName,
  MonitorUserConfig,
  MonitorAppConstants,
  MonitorConfig,
  RuntimeSettingKey,
  SettingsPatch
} from './config';
export {
  ValidationError,
  SettingsValidationError,
  InitializationError,
  AcquisitionError
} from './errors';
