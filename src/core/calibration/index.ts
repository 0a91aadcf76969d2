export { rawToPercentage, withCalibrationPoint, tareProfile } from './calibration';
export { createCalibrationProfile, describeCalibrationProblem, RAW_MAX } from './helpers';
export * from './types';
