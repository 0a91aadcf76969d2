/**
 * Sensor helper functions
 */

/**
 * Check a single conversion
 * Zero and negative samples are what a disconnected or failing input produces.
 */
export function isUsableSample(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Should a stuck-input recovery run for this health verdict
 */
export function needsRecovery(status: string, issues: readonly string[]): boolean {
  if (status !== 'degraded') {
    return false;
  }
  return issues.some(function(issue) {
    return issue.indexOf('stuck') !== -1;
  });
}
