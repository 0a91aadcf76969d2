/**
 * Slack notifier types
 */

import type { Notifier } from '../types';

export interface SlackNotifierConfig {
  enabled: boolean;
  /** Bot token (xoxb-...), empty when not configured */
  botToken: string;
  /** Channel name with leading '#' or channel id */
  channel: string;
  /** Prepended to leak alerts, e.g. '<@U012345>' or '@here' */
  mentionUsers: readonly string[];
  /** Abort a request after this long */
  timeoutMs: number;
}

/**
 * Settings that can change while running
 */
export type SlackRuntimeSettings = Pick<SlackNotifierConfig, 'enabled' | 'channel' | 'mentionUsers'>;

export interface SlackNotifier extends Notifier {
  reconfigure(settings: SlackRuntimeSettings): void;
}

/**
 * chat.postMessage request body
 */
export interface SlackPayload {
  channel: string;
  text: string;
  parse: 'full';
  link_names: boolean;
  attachments?: SlackAttachment[];
}

export interface SlackAttachment {
  color: 'danger';
  text: string;
  footer: string;
  ts: number;
}
