export { createRollingHistory } from './rolling-history';
export * from './types';
