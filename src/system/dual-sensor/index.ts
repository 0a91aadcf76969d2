export { createDualSensorCoordinator } from './dual-sensor';
export { combineHealth, levelDifference, readingStatus, NOT_INITIALIZED } from './helpers';
export * from './types';
