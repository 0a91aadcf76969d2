/**
 * Parsing of runtime settings given as text (command line, environment)
 */

import type { Result, RuntimeSettingKey, SettingsPatch } from '$types';

export const RUNTIME_SETTING_KEYS: readonly RuntimeSettingKey[] = [
  'SAMPLE_INTERVAL_SEC',
  'LEAK_THRESHOLD_PERCENT',
  'ALERT_COOLDOWN_SEC',
  'CONSECUTIVE_READINGS_FOR_ALERT',
  'SLACK_ENABLED',
  'SLACK_CHANNEL',
  'SLACK_MENTION_USERS'
];

export function isRuntimeSettingKey(key: string): key is RuntimeSettingKey {
  for (const candidate of RUNTIME_SETTING_KEYS) {
    if (candidate === key) return true;
  }
  return false;
}

/**
 * Ensure a Slack channel name carries its leading '#'
 * @param channel - Channel as typed by the user
 * @returns Trimmed channel with '#' prefix
 */
export function normalizeSlackChannel(channel: string): string {
  const trimmed = channel.trim();
  return trimmed.startsWith('#') ? trimmed : '#' + trimmed;
}

function parseNumber(key: string, text: string): Result<number> {
  const value = Number(text.trim());
  if (text.trim() === '' || !Number.isFinite(value)) {
    return { ok: false, error: 'Invalid ' + key + ': ' + text };
  }
  return { ok: true, value: value };
}

/**
 * Parse one "KEY=value" assignment into a settings patch
 *
 * Values are converted to the field's type; range checks are left to
 * validateSettingsPatch.
 *
 * @example
 * ```typescript
 * parseSettingAssignment('LEAK_THRESHOLD_PERCENT=7.5');
 * // { ok: true, value: { LEAK_THRESHOLD_PERCENT: 7.5 } }
 * ```
 */
export function parseSettingAssignment(assignment: string): Result<SettingsPatch> {
  const eq = assignment.indexOf('=');
  if (eq <= 0) {
    return { ok: false, error: 'Expected KEY=value, got "' + assignment + '"' };
  }

  const key = assignment.slice(0, eq).trim().toUpperCase();
  const text = assignment.slice(eq + 1);

  if (!isRuntimeSettingKey(key)) {
    return { ok: false, error: 'Unknown setting ' + key + ' (allowed: ' + RUNTIME_SETTING_KEYS.join(', ') + ')' };
  }

  switch (key) {
    case 'SAMPLE_INTERVAL_SEC': {
      const parsed = parseNumber(key, text);
      return parsed.ok ? { ok: true, value: { SAMPLE_INTERVAL_SEC: parsed.value } } : parsed;
    }
    case 'LEAK_THRESHOLD_PERCENT': {
      const parsed = parseNumber(key, text);
      return parsed.ok ? { ok: true, value: { LEAK_THRESHOLD_PERCENT: parsed.value } } : parsed;
    }
    case 'ALERT_COOLDOWN_SEC': {
      const parsed = parseNumber(key, text);
      return parsed.ok ? { ok: true, value: { ALERT_COOLDOWN_SEC: parsed.value } } : parsed;
    }
    case 'CONSECUTIVE_READINGS_FOR_ALERT': {
      const parsed = parseNumber(key, text);
      return parsed.ok ? { ok: true, value: { CONSECUTIVE_READINGS_FOR_ALERT: parsed.value } } : parsed;
    }
    case 'SLACK_ENABLED': {
      const flag = text.trim().toLowerCase();
      if (flag !== 'true' && flag !== 'false') {
        return { ok: false, error: 'Invalid SLACK_ENABLED: ' + text + ' (expected true or false)' };
      }
      return { ok: true, value: { SLACK_ENABLED: flag === 'true' } };
    }
    case 'SLACK_CHANNEL':
      return { ok: true, value: { SLACK_CHANNEL: normalizeSlackChannel(text) } };
    case 'SLACK_MENTION_USERS': {
      const users = text.split(',').map(function(u) { return u.trim(); }).filter(function(u) { return u !== ''; });
      return { ok: true, value: { SLACK_MENTION_USERS: users } };
    }
  }
}

/**
 * Merge several assignments into one patch, stopping at the first bad one
 */
export function parseSettingAssignments(assignments: readonly string[]): Result<SettingsPatch> {
  let patch: SettingsPatch = {};
  for (const assignment of assignments) {
    const parsed = parseSettingAssignment(assignment);
    if (!parsed.ok) return parsed;
    patch = { ...patch, ...parsed.value };
  }
  return { ok: true, value: patch };
}
