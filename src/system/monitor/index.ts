export { createLeakMonitor } from './monitor';
export {
  describeHealthChange,
  formatReadingSummary,
  isCleanupDue,
  pickSettings,
  withSensorCalibration,
  HEALTH_ALERT_KIND,
  INIT_FAILURE_KIND
} from './helpers';
export * from './types';
