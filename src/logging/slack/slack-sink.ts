/**
 * Slack webhook output sink with buffering and retry
 *
 * Forwards log messages to a Slack incoming webhook for remote monitoring.
 * Features:
 * - Webhook URL comes from configuration (SLACK_WEBHOOK_URL in the environment)
 * - Buffers failed messages for retry
 * - Exponential backoff retry (delay doubles per failure, capped at 60s)
 * - Drops oldest messages when buffer full
 * - Slack failures never reach the caller
 */

import type { ConsoleAPI, FetchFn, InitMessage, SlackSink, SlackSinkConfig, TimerAPI } from '../types';

/**
 * Message in the retry buffer
 */
interface BufferedMessage {
  text: string;
  retries: number;
}

const MAX_RETRY_DELAY_MS = 60000;

/**
 * Create a Slack sink with buffering and retry
 *
 * Failed messages are buffered and retried with exponential backoff.
 * The sink must be initialized before use.
 *
 * @param fetchApi - fetch implementation used for the webhook POST
 * @param timerApi - Timer API for retry scheduling
 * @param config - Slack sink configuration
 * @param fallback - Console used to report delivery problems
 * @returns Slack sink instance
 *
 * @example
 * ```typescript
 * const slackSink = createSlackSink(fetch, createNodeTimerApi(), {
 *   enabled: true,
 *   webhookUrl: process.env.SLACK_WEBHOOK_URL ?? '',
 *   bufferSize: 10,
 *   retryDelayMs: 5000,
 *   maxRetries: 5
 * }, console);
 *
 * const message = await slackSink.initialize();
 * ```
 */
export function createSlackSink(
  fetchApi: FetchFn,
  timerApi: TimerAPI,
  config: SlackSinkConfig,
  fallback: ConsoleAPI
): SlackSink {
  let initialized = false;
  let closed = false;
  const buffer: BufferedMessage[] = [];
  let retryTimerActive = false;
  let currentRetryDelay = config.retryDelayMs;
  const inFlight = new Set<Promise<void>>();

  function active(): boolean {
    return config.enabled && config.webhookUrl !== '' && !closed;
  }

  /**
   * POST one message to the webhook
   * @returns True when Slack answered 2xx
   */
  async function sendToSlack(message: BufferedMessage): Promise<boolean> {
    try {
      const response = await fetchApi(config.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: message.text })
      });
      if (response.ok) {
        return true;
      }
      fallback.warn('Slack send failed: HTTP ' + response.status);
      return false;
    } catch (err) {
      fallback.warn('Slack send exception: ' + String(err));
      return false;
    }
  }

  function track(work: Promise<void>): void {
    inFlight.add(work);
    void work.then(function() {
      inFlight.delete(work);
    });
  }

  function scheduleRetry(): void {
    timerApi.set(currentRetryDelay, function() {
      track(processBuffer());
    });
  }

  /**
   * Process the retry buffer
   * Attempts to send the first message, schedules retry on failure
   */
  async function processBuffer(): Promise<void> {
    while (buffer.length > 0 && !closed) {
      const message = buffer[0];
      const sent = await sendToSlack(message);

      if (sent) {
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;
        continue;
      }

      message.retries++;
      if (message.retries >= config.maxRetries) {
        fallback.warn('Slack message dropped after ' + config.maxRetries + ' retries');
        buffer.shift();
        currentRetryDelay = config.retryDelayMs;
      } else {
        currentRetryDelay = Math.min(currentRetryDelay * 2, MAX_RETRY_DELAY_MS);
      }

      if (buffer.length > 0) {
        scheduleRetry();
        return;
      }
    }

    retryTimerActive = false;
    currentRetryDelay = config.retryDelayMs;
  }

  function enqueue(message: BufferedMessage): void {
    if (buffer.length >= config.bufferSize) {
      const dropped = buffer.shift();
      fallback.warn('Slack buffer full, dropping oldest message: ' + (dropped ? dropped.text.substring(0, 50) : ''));
    }
    buffer.push(message);

    if (!retryTimerActive) {
      retryTimerActive = true;
      scheduleRetry();
    }
  }

  async function initialize(): Promise<InitMessage> {
    initialized = true;
    if (!config.enabled) {
      return { success: true, message: 'Slack log forwarding disabled' };
    }
    if (config.webhookUrl === '') {
      return { success: false, message: 'Slack log forwarding enabled but SLACK_WEBHOOK_URL is not set' };
    }
    return { success: true, message: 'Slack webhook configured' };
  }

  /**
   * Send formatted message to Slack
   * Messages are sent immediately if possible, or buffered for retry
   * @param formattedMessage - Pre-formatted log message (already filtered by level)
   */
  function write(formattedMessage: string): void {
    if (!active()) {
      return;
    }

    const message: BufferedMessage = { text: formattedMessage, retries: 0 };

    track(sendToSlack(message).then(function(sent) {
      if (!sent && !closed) {
        enqueue(message);
      }
    }));
  }

  /**
   * Stop retrying and wait for sends already on the wire
   */
  async function close(): Promise<void> {
    closed = true;
    timerApi.clearAll();
    await Promise.allSettled(Array.from(inFlight));
  }

  function isInitialized(): boolean {
    return initialized;
  }

  function getBufferSize(): number {
    return buffer.length;
  }

  return {
    write: write,
    initialize: initialize,
    close: close,
    isInitialized: isInitialized,
    getBufferSize: getBufferSize
  };
}
