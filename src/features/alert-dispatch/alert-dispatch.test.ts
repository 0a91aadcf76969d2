import type { CombinedReading } from '$types/common';
import { createFakeNotifier, createMemoryStore, createRecordingLogger } from '$test-utils';
import type { FakeNotifier, MemoryStore, RecordingLogger } from '$test-utils';
import type { LeakDetectionConfig } from '@core/leak-detection';
import { createAlertDispatcher } from './alert-dispatch';
import { buildLeakAlert, formatLeakAlertMessage } from './helpers';

const config: LeakDetectionConfig = {
  LEAK_THRESHOLD_PERCENT: 5,
  CONSECUTIVE_READINGS_FOR_ALERT: 3,
  ALERT_COOLDOWN_SEC: 3600,
};

function reading(reference: number, control: number): CombinedReading {
  const difference = Math.round((reference - control) * 10) / 10;
  return {
    reference: { raw: 30000, voltage: 1.875, percentage: reference, timestamp: 1000 },
    control: { raw: 32000, voltage: 2, percentage: control, timestamp: 1000 },
    difference: difference,
    status: Math.abs(difference) >= 5 ? 'leak_detected' : 'normal',
    timestamp: 1000,
  };
}

describe('alert dispatcher', () => {
  let store: MemoryStore;
  let notifier: FakeNotifier;
  let logger: RecordingLogger;
  let nowSec: number;

  function createDispatcher() {
    return createAlertDispatcher({ store: store, notifier: notifier, logger: logger, clock: () => nowSec });
  }

  beforeEach(() => {
    store = createMemoryStore();
    notifier = createFakeNotifier();
    logger = createRecordingLogger();
    nowSec = 5000;
  });

  it('should fire once after three qualifying readings', async () => {
    const dispatcher = createDispatcher();
    const leak = reading(56, 50);

    expect((await dispatcher.process(leak, config)).outcome).toBe('none');
    expect((await dispatcher.process(leak, config)).outcome).toBe('none');
    expect(dispatcher.phase(config)).toBe('ACCUMULATING');

    const result = await dispatcher.process(leak, config);

    expect(result).toEqual({ outcome: 'fired', alertId: 1, notified: true });
    expect(store.alerts).toEqual([{
      id: 1,
      type: 'leak_detected',
      message: 'Potential leak detected! Difference: 6.0% (Reference: 56.0%, Control: 50.0%)',
      difference: 6,
      timestamp: 5000,
      acknowledged: false,
      acknowledgedAt: null,
    }]);
    expect(notifier.leaks).toEqual([leak]);
    expect(dispatcher.state()).toEqual({ consecutiveLeakReadings: 0, lastAlertTime: 5000 });
    expect(dispatcher.phase(config)).toBe('ALERTED');
    expect(logger.at(2)).toEqual(['Potential leak detected! Difference: 6.0% (Reference: 56.0%, Control: 50.0%)']);
  });

  it('should reset the counter on a reading within the threshold', async () => {
    const dispatcher = createDispatcher();

    await dispatcher.process(reading(56, 50), config);
    await dispatcher.process(reading(56, 50), config);
    await dispatcher.process(reading(52, 50), config);
    await dispatcher.process(reading(56, 50), config);

    expect(store.alerts).toHaveLength(0);
    expect(dispatcher.state().consecutiveLeakReadings).toBe(1);
  });

  it('should not count a difference equal to the threshold', async () => {
    const dispatcher = createDispatcher();

    await dispatcher.process(reading(55, 50), config);

    expect(dispatcher.state().consecutiveLeakReadings).toBe(0);
    expect(dispatcher.phase(config)).toBe('NORMAL');
  });

  it('should count negative differences', async () => {
    const dispatcher = createDispatcher();

    for (let i = 0; i < 3; i++) {
      await dispatcher.process(reading(40, 50), config);
    }

    expect(store.alerts).toHaveLength(1);
    expect(store.alerts[0].message).toBe('Potential leak detected! Difference: -10.0% (Reference: 40.0%, Control: 50.0%)');
  });

  it('should suppress during the cooldown and keep the counter', async () => {
    const dispatcher = createDispatcher();
    const leak = reading(56, 50);

    for (let i = 0; i < 3; i++) {
      await dispatcher.process(leak, config);
    }
    nowSec = 6000;
    for (let i = 0; i < 4; i++) {
      await dispatcher.process(leak, config);
    }

    expect(store.alerts).toHaveLength(1);
    expect(dispatcher.state()).toEqual({ consecutiveLeakReadings: 4, lastAlertTime: 5000 });

    nowSec = 5000 + 3600;
    const result = await dispatcher.process(leak, config);

    expect(result.outcome).toBe('fired');
    expect(store.alerts).toHaveLength(2);
    expect(notifier.leaks).toHaveLength(2);
  });

  it('should report suppression', async () => {
    const dispatcher = createAlertDispatcher(
      { store: store, notifier: notifier, logger: logger, clock: () => nowSec },
      { consecutiveLeakReadings: 2, lastAlertTime: 4900 }
    );

    const result = await dispatcher.process(reading(56, 50), config);

    expect(result).toEqual({ outcome: 'suppressed', alertId: null, notified: false });
    expect(logger.at(0)).toEqual(['Leak alert suppressed by cooldown (3 readings)']);
  });

  it('should keep the counter and retry when the alert cannot be stored', async () => {
    const dispatcher = createDispatcher();
    const leak = reading(56, 50);
    store.failAlerts = true;

    await dispatcher.process(leak, config);
    await dispatcher.process(leak, config);
    const failed = await dispatcher.process(leak, config);

    expect(failed).toEqual({ outcome: 'failed', alertId: null, notified: false });
    expect(logger.at(3)).toEqual(['Failed to store leak alert: Error: disk I/O error']);
    expect(notifier.leaks).toHaveLength(0);
    expect(dispatcher.state()).toEqual({ consecutiveLeakReadings: 3, lastAlertTime: null });

    store.failAlerts = false;
    const retried = await dispatcher.process(leak, config);

    expect(retried.outcome).toBe('fired');
    expect(store.alerts).toHaveLength(1);
  });

  it('should treat an undelivered notification as fired', async () => {
    const dispatcher = createDispatcher();
    notifier.failing = true;

    for (let i = 0; i < 3; i++) {
      await dispatcher.process(reading(56, 50), config);
    }

    expect(dispatcher.state().lastAlertTime).toBe(5000);
    expect(logger.at(2)).toEqual([
      'Potential leak detected! Difference: 6.0% (Reference: 56.0%, Control: 50.0%)',
      'Leak alert 1 stored but notification was not delivered',
    ]);
  });

  describe('helpers', () => {
    it('should format the alert message with one decimal', () => {
      expect(formatLeakAlertMessage(reading(60.25, 50))).toBe(
        'Potential leak detected! Difference: 10.3% (Reference: 60.3%, Control: 50.0%)'
      );
    });

    it('should stamp the alert with the dispatch time', () => {
      expect(buildLeakAlert(reading(56, 50), 42)).toEqual({
        type: 'leak_detected',
        message: 'Potential leak detected! Difference: 6.0% (Reference: 56.0%, Control: 50.0%)',
        difference: 6,
        timestamp: 42,
        acknowledged: false,
      });
    });
  });
});
