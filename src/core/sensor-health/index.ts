export { createHealthMonitor } from './sensor-health';
export {
  checkErrorStreak,
  checkVoltageStability,
  measureDrift,
  describeDrift,
  checkStuck,
  calculateStabilityScore,
  resolveHealthState
} from './helpers';
export * from './types';
