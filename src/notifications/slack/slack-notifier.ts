/**
 * Slack notifications through the Web API (chat.postMessage)
 *
 * Leak alerts go out urgent (with a danger attachment). System and recovery
 * messages go out plain. Delivery problems are logged and reported as false.
 */

import type { CombinedReading } from '$types/common';
import type { FetchFn, Logger } from '@logging';
import type { SlackNotifier, SlackNotifierConfig, SlackRuntimeSettings } from './types';
import {
  SLACK_POST_MESSAGE_URL,
  buildLeakMessage,
  buildPayload,
  buildRecoveryMessage,
  buildSystemMessage,
  parseSlackResponse
} from './helpers';

const TEST_MESSAGE = ':gear: Water monitoring system startup - Slack notifications active';

/**
 * Create a Slack notifier
 *
 * @param config - Token, channel, mentions and request timeout
 * @param fetchApi - fetch implementation
 * @param logger - Where delivery problems are reported
 * @param clock - Current time in seconds (attachment timestamp)
 */
export function createSlackNotifier(
  config: SlackNotifierConfig,
  fetchApi: FetchFn,
  logger: Logger,
  clock: () => number
): SlackNotifier {
  let enabled = config.enabled;
  let channel = config.channel;
  let mentionUsers = config.mentionUsers.slice();
  let warnedMissingToken = false;

  function active(): boolean {
    if (!enabled) {
      return false;
    }
    if (config.botToken === '') {
      if (!warnedMissingToken) {
        logger.warning('Slack enabled but no bot token provided (set SLACK_BOT_TOKEN)');
        warnedMissingToken = true;
      }
      return false;
    }
    return true;
  }

  async function send(text: string, urgent: boolean): Promise<boolean> {
    const payload = buildPayload(channel, text, urgent, clock());

    try {
      const response = await fetchApi(SLACK_POST_MESSAGE_URL, {
        method: 'POST',
        headers: {
          'Authorization': 'Bearer ' + config.botToken,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(config.timeoutMs)
      });

      if (!response.ok) {
        logger.warning('HTTP error sending to Slack: ' + response.status + ' - ' + response.statusText);
        return false;
      }

      const result = parseSlackResponse(await response.json());
      if (!result.ok) {
        logger.warning('Slack API error: ' + result.error);
        return false;
      }

      logger.debug('Slack message sent successfully');
      return true;
    } catch (err) {
      logger.warning('Unexpected error sending to Slack: ' + String(err));
      return false;
    }
  }

  async function notifyLeak(reading: CombinedReading): Promise<boolean> {
    if (!active()) return false;
    return send(buildLeakMessage(reading, mentionUsers), true);
  }

  async function notifySystem(kind: string, message: string): Promise<boolean> {
    if (!active()) return false;
    return send(buildSystemMessage(kind, message), false);
  }

  async function notifyRecovery(message: string): Promise<boolean> {
    if (!active()) return false;
    return send(buildRecoveryMessage(message), false);
  }

  async function testConnection(): Promise<boolean> {
    if (!active()) {
      logger.info('Slack notifications disabled');
      return false;
    }
    return send(TEST_MESSAGE, false);
  }

  function reconfigure(settings: SlackRuntimeSettings): void {
    enabled = settings.enabled;
    channel = settings.channel;
    mentionUsers = settings.mentionUsers.slice();
  }

  return {
    notifyLeak: notifyLeak,
    notifySystem: notifySystem,
    notifyRecovery: notifyRecovery,
    testConnection: testConnection,
    isEnabled: function() { return enabled && config.botToken !== ''; },
    reconfigure: reconfigure
  };
}
