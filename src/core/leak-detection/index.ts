export { initLeakDetectionState, evaluateLeak, markAlertFired, getLeakPhase } from './leak-detection';
export { isInCooldown, exceedsThreshold } from './helpers';
export * from './types';
