export { createWaterLevelSensor } from './sensors';
export { isUsableSample, needsRecovery } from './helpers';
export * from './types';
