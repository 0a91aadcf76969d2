/**
 * Alert dispatch types
 */

import type { CombinedReading } from '$types/common';
import type { Logger } from '@logging';
import type { ReadingStore } from '@storage';
import type { Notifier } from '@notifications/types';
import type { LeakAction, LeakDetectionConfig, LeakDetectionState, LeakPhase } from '@core/leak-detection';

export interface AlertDispatcherDependencies {
  store: Pick<ReadingStore, 'storeAlert'>;
  notifier: Pick<Notifier, 'notifyLeak'>;
  logger: Logger;
  /** Current time in seconds */
  clock: () => number;
}

/**
 * Outcome of one processed reading
 * - fired: alert stored (and a notification attempted)
 * - failed: alert was due but could not be stored, counter kept for a retry
 */
export type DispatchOutcome = Exclude<LeakAction, 'fire'> | 'fired' | 'failed';

export interface DispatchResult {
  readonly outcome: DispatchOutcome;
  /** Id of the stored alert when outcome is 'fired' */
  readonly alertId: number | null;
  /** Whether the notifier confirmed delivery ('fired' only) */
  readonly notified: boolean;
}

export interface AlertDispatcher {
  /** Run the leak check for one reading and dispatch an alert when due */
  process(reading: CombinedReading, config: LeakDetectionConfig): Promise<DispatchResult>;
  state(): LeakDetectionState;
  phase(config: LeakDetectionConfig): LeakPhase;
}
