/**
 * Slack message builders
 */

import type { CombinedReading } from '$types/common';
import { formatTimestamp } from '@utils/time';
import type { SlackPayload } from './types';

export const SLACK_POST_MESSAGE_URL = 'https://slack.com/api/chat.postMessage';

const FOOTER = 'Water Monitoring System';

export function buildLeakMessage(reading: CombinedReading, mentionUsers: readonly string[]): string {
  return ':rotating_light: *WATER LEAK DETECTED* :rotating_light:\n' +
    '\n' +
    mentionUsers.join(' ') + '\n' +
    '\n' +
    '*Alert Details:*\n' +
    '• Sensor Difference: ' + Math.abs(reading.difference).toFixed(1) + '%\n' +
    '• Reference Sensor: ' + reading.reference.percentage.toFixed(1) + '%\n' +
    '• Control Sensor: ' + reading.control.percentage.toFixed(1) + '%\n' +
    '• Detection Time: ' + formatTimestamp(reading.timestamp) + '\n' +
    '\n' +
    '*Action Required:*\n' +
    'Check water system immediately for potential leaks.';
}

export function buildSystemMessage(kind: string, message: string): string {
  return ':warning: *System Alert: ' + kind + '*\n' + message;
}

export function buildRecoveryMessage(message: string): string {
  return ':white_check_mark: *System Recovery*\n' + message;
}

/**
 * Urgent messages carry a red attachment repeating the text
 */
export function buildPayload(channel: string, text: string, urgent: boolean, nowSec: number): SlackPayload {
  const payload: SlackPayload = {
    channel: channel,
    text: text,
    parse: 'full',
    link_names: true
  };
  if (urgent) {
    payload.attachments = [{ color: 'danger', text: text, footer: FOOTER, ts: nowSec }];
  }
  return payload;
}

/**
 * Pull `ok` and `error` out of a chat.postMessage response body
 */
export function parseSlackResponse(body: unknown): { ok: boolean; error: string } {
  if (typeof body !== 'object' || body === null) {
    return { ok: false, error: 'invalid response' };
  }
  const ok = 'ok' in body && body.ok === true;
  const error = 'error' in body && typeof body.error === 'string' ? body.error : 'unknown error';
  return { ok: ok, error: ok ? '' : error };
}
