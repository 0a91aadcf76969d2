import type { CombinedReading } from '$types/common';
import { formatTimestamp } from '@utils/time';
import { createRecordingLogger } from '$test-utils';
import type { RecordingLogger } from '$test-utils';
import { createSlackNotifier } from './slack-notifier';
import { buildLeakMessage, parseSlackResponse } from './helpers';
import type { SlackNotifierConfig } from './types';

const reading: CombinedReading = {
  reference: { raw: 20000, voltage: 1.25, percentage: 100, timestamp: 1700000000 },
  control: { raw: 50000, voltage: 3.125, percentage: 0, timestamp: 1700000000 },
  difference: 100,
  status: 'leak_detected',
  timestamp: 1700000000
};

const config: SlackNotifierConfig = {
  enabled: true,
  botToken: 'test-token',
  channel: '#alerts',
  mentionUsers: ['@here'],
  timeoutMs: 10000
};

function slackOk(): Response {
  return new Response(JSON.stringify({ ok: true }), { status: 200 });
}

function createFetch(respond: () => Promise<Response>) {
  return vi.fn(async (_url: string, _init: RequestInit) => respond());
}

function bodyOf(call: [string, RequestInit]): unknown {
  return JSON.parse(String(call[1].body));
}

function requestBody(fetchApi: ReturnType<typeof createFetch>): unknown {
  return bodyOf(fetchApi.mock.calls[0]);
}

describe('slack notifier', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = createRecordingLogger();
  });

  it('should post an urgent leak alert with a danger attachment', async () => {
    const fetchApi = createFetch(async () => slackOk());
    const notifier = createSlackNotifier(config, fetchApi, logger, () => 1700000060);

    expect(await notifier.notifyLeak(reading)).toBe(true);

    const text = buildLeakMessage(reading, ['@here']);
    expect(fetchApi).toHaveBeenCalledWith('https://slack.com/api/chat.postMessage', expect.objectContaining({
      method: 'POST',
      headers: { 'Authorization': 'Bearer test-token', 'Content-Type': 'application/json' }
    }));
    expect(requestBody(fetchApi)).toEqual({
      channel: '#alerts',
      text: text,
      parse: 'full',
      link_names: true,
      attachments: [{ color: 'danger', text: text, footer: 'Water Monitoring System', ts: 1700000060 }]
    });
  });

  it('should format the leak message', () => {
    expect(buildLeakMessage(reading, ['@alice', '@bob'])).toBe(
      ':rotating_light: *WATER LEAK DETECTED* :rotating_light:\n\n' +
      '@alice @bob\n\n' +
      '*Alert Details:*\n' +
      '• Sensor Difference: 100.0%\n' +
      '• Reference Sensor: 100.0%\n' +
      '• Control Sensor: 0.0%\n' +
      '• Detection Time: ' + formatTimestamp(1700000000) + '\n\n' +
      '*Action Required:*\n' +
      'Check water system immediately for potential leaks.'
    );
  });

  it('should post system and recovery messages without attachments', async () => {
    const fetchApi = createFetch(async () => slackOk());
    const notifier = createSlackNotifier(config, fetchApi, logger, () => 0);

    await notifier.notifySystem('Sensor Failure', 'control sensor failed');
    await notifier.notifyRecovery('All sensors healthy');

    const bodies = fetchApi.mock.calls.map(bodyOf);
    expect(bodies[0]).toEqual({
      channel: '#alerts',
      text: ':warning: *System Alert: Sensor Failure*\ncontrol sensor failed',
      parse: 'full',
      link_names: true
    });
    expect(bodies[1]).toEqual(expect.objectContaining({ text: ':white_check_mark: *System Recovery*\nAll sensors healthy' }));
  });

  it('should send the startup message on testConnection', async () => {
    const fetchApi = createFetch(async () => slackOk());
    const notifier = createSlackNotifier(config, fetchApi, logger, () => 0);

    expect(await notifier.testConnection()).toBe(true);
    expect(requestBody(fetchApi)).toEqual(expect.objectContaining({
      text: ':gear: Water monitoring system startup - Slack notifications active'
    }));
  });

  it('should do nothing when disabled', async () => {
    const fetchApi = createFetch(async () => slackOk());
    const notifier = createSlackNotifier({ ...config, enabled: false }, fetchApi, logger, () => 0);

    expect(await notifier.notifyLeak(reading)).toBe(false);
    expect(await notifier.testConnection()).toBe(false);
    expect(fetchApi).not.toHaveBeenCalled();
    expect(notifier.isEnabled()).toBe(false);
  });

  it('should refuse to send without a token and warn once', async () => {
    const fetchApi = createFetch(async () => slackOk());
    const notifier = createSlackNotifier({ ...config, botToken: '' }, fetchApi, logger, () => 0);

    expect(await notifier.notifySystem('x', 'y')).toBe(false);
    expect(await notifier.notifySystem('x', 'y')).toBe(false);

    expect(fetchApi).not.toHaveBeenCalled();
    expect(logger.at(2)).toEqual(['Slack enabled but no bot token provided (set SLACK_BOT_TOKEN)']);
  });

  it('should report a Slack API error', async () => {
    const fetchApi = createFetch(async () => new Response(JSON.stringify({ ok: false, error: 'channel_not_found' }), { status: 200 }));
    const notifier = createSlackNotifier(config, fetchApi, logger, () => 0);

    expect(await notifier.notifyRecovery('ok')).toBe(false);
    expect(logger.at(2)).toEqual(['Slack API error: channel_not_found']);
  });

  it('should report an HTTP error', async () => {
    const fetchApi = createFetch(async () => new Response('', { status: 503, statusText: 'Service Unavailable' }));
    const notifier = createSlackNotifier(config, fetchApi, logger, () => 0);

    expect(await notifier.notifyLeak(reading)).toBe(false);
    expect(logger.at(2)).toEqual(['HTTP error sending to Slack: 503 - Service Unavailable']);
  });

  it('should report a network failure', async () => {
    const fetchApi = createFetch(async () => {
      throw new TypeError('fetch failed');
    });
    const notifier = createSlackNotifier(config, fetchApi, logger, () => 0);

    expect(await notifier.notifyLeak(reading)).toBe(false);
    expect(logger.at(2)).toEqual(['Unexpected error sending to Slack: TypeError: fetch failed']);
  });

  it('should apply runtime settings', async () => {
    const fetchApi = createFetch(async () => slackOk());
    const notifier = createSlackNotifier({ ...config, enabled: false }, fetchApi, logger, () => 0);

    notifier.reconfigure({ enabled: true, channel: '#water', mentionUsers: [] });
    await notifier.notifySystem('a', 'b');

    expect(requestBody(fetchApi)).toEqual(expect.objectContaining({ channel: '#water' }));
  });

  describe('parseSlackResponse', () => {
    it('should read ok and error', () => {
      expect(parseSlackResponse({ ok: true })).toEqual({ ok: true, error: '' });
      expect(parseSlackResponse({ ok: false, error: 'invalid_auth' })).toEqual({ ok: false, error: 'invalid_auth' });
      expect(parseSlackResponse({ ok: false })).toEqual({ ok: false, error: 'unknown error' });
      expect(parseSlackResponse('nope')).toEqual({ ok: false, error: 'invalid response' });
    });
  });
});
