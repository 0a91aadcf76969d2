export { createSqliteStore } from './sqlite-store';
export { downsample, CHART_MAX_POINTS } from './helpers';
export * from './types';
