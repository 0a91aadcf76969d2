/**
 * Unit tests for slack sink
 */

import { createSlackSink } from './slack-sink';
import type { SlackSinkConfig, TimerAPI } from '../types';

function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function makeTimer() {
  const pending: { delayMs: number; callback: () => void }[] = [];
  const timerApi: TimerAPI = {
    set: vi.fn((delayMs: number, callback: () => void) => {
      pending.push({ delayMs: delayMs, callback: callback });
    }),
    clearAll: vi.fn(() => {
      pending.length = 0;
    })
  };
  function runNext(): number {
    const next = pending.shift();
    if (!next) throw new Error('no timer pending');
    next.callback();
    return next.delayMs;
  }
  return { timerApi, pending, runNext };
}

const baseConfig: SlackSinkConfig = {
  enabled: true,
  webhookUrl: 'https://hooks.example.test/webhook',
  bufferSize: 3,
  retryDelayMs: 1000,
  maxRetries: 3
};

function ok(): Response {
  return new Response('ok', { status: 200 });
}

function fail(): Response {
  return new Response('nope', { status: 500 });
}

describe('createSlackSink', () => {
  describe('initialize', () => {
    it('should report disabled forwarding as success', async () => {
      const { timerApi } = makeTimer();
      const sink = createSlackSink(vi.fn(), timerApi, { ...baseConfig, enabled: false }, { log: vi.fn(), warn: vi.fn() });

      await expect(sink.initialize()).resolves.toEqual({ success: true, message: 'Slack log forwarding disabled' });
      expect(sink.isInitialized()).toBe(true);
    });

    it('should fail when enabled without a webhook URL', async () => {
      const { timerApi } = makeTimer();
      const sink = createSlackSink(vi.fn(), timerApi, { ...baseConfig, webhookUrl: '' }, { log: vi.fn(), warn: vi.fn() });

      const message = await sink.initialize();

      expect(message).toEqual({
        success: false,
        message: 'Slack log forwarding enabled but SLACK_WEBHOOK_URL is not set'
      });
    });
  });

  describe('write', () => {
    it('should POST the message as JSON', async () => {
      const fetchApi = vi.fn(async () => ok());
      const { timerApi } = makeTimer();
      const sink = createSlackSink(fetchApi, timerApi, baseConfig, { log: vi.fn(), warn: vi.fn() });

      sink.write('⚠️ [WARNING]  leak', 2);
      await flushPromises();

      expect(fetchApi).toHaveBeenCalledWith('https://hooks.example.test/webhook', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text: '⚠️ [WARNING]  leak' })
      });
      expect(sink.getBufferSize()).toBe(0);
    });

    it('should do nothing when disabled', async () => {
      const fetchApi = vi.fn(async () => ok());
      const { timerApi } = makeTimer();
      const sink = createSlackSink(fetchApi, timerApi, { ...baseConfig, enabled: false }, { log: vi.fn(), warn: vi.fn() });

      sink.write('x', 3);
      await flushPromises();

      expect(fetchApi).not.toHaveBeenCalled();
    });

    it('should buffer a failed message and retry it after the initial delay', async () => {
      const fetchApi = vi.fn()
        .mockResolvedValueOnce(fail())
        .mockResolvedValueOnce(ok());
      const { timerApi, runNext } = makeTimer();
      const sink = createSlackSink(fetchApi, timerApi, baseConfig, { log: vi.fn(), warn: vi.fn() });

      sink.write('x', 3);
      await flushPromises();
      expect(sink.getBufferSize()).toBe(1);

      expect(runNext()).toBe(1000);
      await flushPromises();

      expect(fetchApi).toHaveBeenCalledTimes(2);
      expect(sink.getBufferSize()).toBe(0);
    });

    it('should double the delay after each failed retry', async () => {
      const fetchApi = vi.fn(async () => fail());
      const { timerApi, runNext } = makeTimer();
      const sink = createSlackSink(fetchApi, timerApi, { ...baseConfig, maxRetries: 10 }, { log: vi.fn(), warn: vi.fn() });

      sink.write('x', 3);
      await flushPromises();

      expect(runNext()).toBe(1000);
      await flushPromises();
      expect(runNext()).toBe(2000);
      await flushPromises();
      expect(runNext()).toBe(4000);
    });

    it('should drop a message after maxRetries', async () => {
      const fetchApi = vi.fn(async () => fail());
      const fallback = { log: vi.fn(), warn: vi.fn() };
      const { timerApi, runNext, pending } = makeTimer();
      const sink = createSlackSink(fetchApi, timerApi, baseConfig, fallback);

      sink.write('x', 3);
      await flushPromises();
      for (let i = 0; i < 3; i++) {
        runNext();
        await flushPromises();
      }

      expect(sink.getBufferSize()).toBe(0);
      expect(pending).toHaveLength(0);
      expect(fallback.warn).toHaveBeenCalledWith('Slack message dropped after 3 retries');
    });

    it('should drop the oldest message when the buffer is full', async () => {
      const fetchApi = vi.fn(async () => fail());
      const fallback = { log: vi.fn(), warn: vi.fn() };
      const { timerApi } = makeTimer();
      const sink = createSlackSink(fetchApi, timerApi, baseConfig, fallback);

      for (let i = 0; i < 4; i++) {
        sink.write('message ' + i, 3);
      }
      await flushPromises();

      expect(sink.getBufferSize()).toBe(3);
      expect(fallback.warn).toHaveBeenCalledWith('Slack buffer full, dropping oldest message: message 0');
    });

    it('should treat a rejected fetch as a failure', async () => {
      const fetchApi = vi.fn(async (): Promise<Response> => {
        throw new Error('offline');
      });
      const fallback = { log: vi.fn(), warn: vi.fn() };
      const { timerApi } = makeTimer();
      const sink = createSlackSink(fetchApi, timerApi, baseConfig, fallback);

      sink.write('x', 3);
      await flushPromises();

      expect(sink.getBufferSize()).toBe(1);
      expect(fallback.warn).toHaveBeenCalledWith('Slack send exception: Error: offline');
    });
  });

  describe('close', () => {
    it('should cancel pending retries and ignore later writes', async () => {
      const fetchApi = vi.fn(async () => fail());
      const { timerApi, pending } = makeTimer();
      const sink = createSlackSink(fetchApi, timerApi, baseConfig, { log: vi.fn(), warn: vi.fn() });

      sink.write('x', 3);
      await flushPromises();
      await sink.close();
      sink.write('y', 3);
      await flushPromises();

      expect(pending).toHaveLength(0);
      expect(fetchApi).toHaveBeenCalledTimes(1);
    });
  });
});
