export { createSlackNotifier } from './slack-notifier';
export { buildLeakMessage, buildSystemMessage, buildRecoveryMessage, buildPayload, SLACK_POST_MESSAGE_URL } from './helpers';
export * from './types';
