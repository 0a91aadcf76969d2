/**
 * Leak alert dispatch
 *
 * Drives the leak detection state machine with each cycle's reading and
 * turns a 'fire' verdict into a stored alert plus a notification. The state
 * is only committed once the alert is in the store.
 */

import type { CombinedReading } from '$types/common';
import {
  initLeakDetectionState,
  evaluateLeak,
  markAlertFired,
  getLeakPhase
} from '@core/leak-detection';
import type { LeakDetectionConfig, LeakDetectionState } from '@core/leak-detection';
import type { AlertDispatcher, AlertDispatcherDependencies, DispatchResult } from './types';
import { buildLeakAlert } from './helpers';

const NOTHING: DispatchResult = { outcome: 'none', alertId: null, notified: false };

/**
 * Create an alert dispatcher
 *
 * @param deps - Alert store, notifier, logger and clock
 * @param initialState - Detection state to resume from
 *
 * @remarks
 * **Failure handling**:
 * - Store fails: logged as critical, counter kept, next qualifying cycle retries
 * - Notifier fails: logged as warning, the alert still counts as fired
 */
export function createAlertDispatcher(
  deps: AlertDispatcherDependencies,
  initialState: LeakDetectionState = initLeakDetectionState()
): AlertDispatcher {
  let current = initialState;

  async function process(reading: CombinedReading, config: LeakDetectionConfig): Promise<DispatchResult> {
    const nowSec = deps.clock();
    const evaluation = evaluateLeak(reading.difference, nowSec, current, config);
    current = evaluation.state;

    if (evaluation.action === 'none') {
      return NOTHING;
    }
    if (evaluation.action === 'suppressed') {
      deps.logger.debug('Leak alert suppressed by cooldown (' + current.consecutiveLeakReadings + ' readings)');
      return { outcome: 'suppressed', alertId: null, notified: false };
    }

    const alert = buildLeakAlert(reading, nowSec);
    let alertId: number;
    try {
      alertId = deps.store.storeAlert(alert);
    } catch (err) {
      deps.logger.critical('Failed to store leak alert: ' + String(err));
      return { outcome: 'failed', alertId: null, notified: false };
    }

    deps.logger.warning(alert.message);
    current = markAlertFired(current, nowSec);

    const notified = await deps.notifier.notifyLeak(reading);
    if (!notified) {
      deps.logger.warning('Leak alert ' + alertId + ' stored but notification was not delivered');
    }

    return { outcome: 'fired', alertId: alertId, notified: notified };
  }

  return {
    process: process,
    state: function() { return current; },
    phase: function(config) { return getLeakPhase(current, deps.clock(), config); }
  };
}
