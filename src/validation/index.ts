export { validateConfig, validateSettingsPatch } from './validator';
export {
  RUNTIME_SETTING_KEYS,
  isRuntimeSettingKey,
  normalizeSlackChannel,
  parseSettingAssignment,
  parseSettingAssignments
} from './settings';
export type { ValidationResult, ValidationError, ValidationWarning } from './types';
