export { now, nowMs, sleep } from './time';
export type { SleepFn } from './time';
export { elapsedSec, formatTimestamp } from './helpers';
