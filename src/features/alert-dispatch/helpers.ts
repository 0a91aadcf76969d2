/**
 * Helper functions for alert dispatch
 */

import type { AlertRecord, CombinedReading } from '$types/common';

export const LEAK_ALERT_TYPE = 'leak_detected';

export function formatLeakAlertMessage(reading: CombinedReading): string {
  return 'Potential leak detected! Difference: ' + reading.difference.toFixed(1) + '% ' +
    '(Reference: ' + reading.reference.percentage.toFixed(1) + '%, ' +
    'Control: ' + reading.control.percentage.toFixed(1) + '%)';
}

/**
 * Build the persisted alert for a leak reading
 * The alert is stamped with the dispatch time, not the reading time.
 */
export function buildLeakAlert(reading: CombinedReading, nowSec: number): AlertRecord {
  return {
    type: LEAK_ALERT_TYPE,
    message: formatLeakAlertMessage(reading),
    difference: reading.difference,
    timestamp: nowSec,
    acknowledged: false,
  };
}
