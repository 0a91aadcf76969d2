export { createAlertDispatcher } from './alert-dispatch';
export { buildLeakAlert, formatLeakAlertMessage, LEAK_ALERT_TYPE } from './helpers';
export * from './types';
