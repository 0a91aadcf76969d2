/**
 * Unit tests for validation helper functions
 */

import {
  addError,
  addWarning,
  validateBoolean,
  validateNonEmptyString,
  validateStringArray,
  validateOneOf,
  validateLogLevel,
  validateNumberRange,
  validateIntegerRange
} from './helpers';
import type { ValidationError, ValidationWarning } from './types';

describe('Validation Helpers', () => {
  // ═══════════════════════════════════════════════════════════════
  // addError() / addWarning()
  // ═══════════════════════════════════════════════════════════════

  describe('addError', () => {
    it('should add error with correct level, field and message', () => {
      const errors: ValidationError[] = [];

      addError(errors, 'SAMPLE_INTERVAL_SEC', 'Value out of range');

      expect(errors).toEqual([
        { level: 'CRITICAL', field: 'SAMPLE_INTERVAL_SEC', message: 'Value out of range' }
      ]);
    });

    it('should accumulate multiple errors in order', () => {
      const errors: ValidationError[] = [];

      addError(errors, 'FIELD1', 'Error 1');
      addError(errors, 'FIELD2', 'Error 2');

      expect(errors.map((e) => e.field)).toEqual(['FIELD1', 'FIELD2']);
    });
  });

  describe('addWarning', () => {
    it('should add warning with WARNING level', () => {
      const warnings: ValidationWarning[] = [];

      addWarning(warnings, 'LEAK_THRESHOLD_PERCENT', 'Outside recommended range');

      expect(warnings).toEqual([
        { level: 'WARNING', field: 'LEAK_THRESHOLD_PERCENT', message: 'Outside recommended range' }
      ]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Type validators
  // ═══════════════════════════════════════════════════════════════

  describe('validateBoolean', () => {
    it('should accept true, false and undefined', () => {
      const errors: ValidationError[] = [];

      validateBoolean(true, 'FLAG', errors);
      validateBoolean(false, 'FLAG', errors);
      validateBoolean(undefined, 'FLAG', errors);

      expect(errors).toHaveLength(0);
    });

    it('should report the received type', () => {
      const errors: ValidationError[] = [];

      validateBoolean('true', 'AUTO_RECOVERY', errors);

      expect(errors[0].message).toBe('AUTO_RECOVERY must be a boolean (got string)');
    });

    it('should treat null as an object', () => {
      const errors: ValidationError[] = [];

      validateBoolean(null, 'AUTO_RECOVERY', errors);

      expect(errors[0].message).toBe('AUTO_RECOVERY must be a boolean (got object)');
    });
  });

  describe('validateNonEmptyString', () => {
    it('should accept a non-empty string', () => {
      const errors: ValidationError[] = [];
      validateNonEmptyString('readings.db', 'DATABASE_PATH', errors);
      expect(errors).toHaveLength(0);
    });

    it('should reject whitespace only', () => {
      const errors: ValidationError[] = [];
      validateNonEmptyString('   ', 'SLACK_CHANNEL', errors);
      expect(errors[0].message).toBe('SLACK_CHANNEL must be a non-empty string');
    });

    it('should reject non-strings', () => {
      const errors: ValidationError[] = [];
      validateNonEmptyString(42, 'DATABASE_PATH', errors);
      expect(errors).toHaveLength(1);
    });
  });

  describe('validateStringArray', () => {
    it('should accept an empty array', () => {
      const errors: ValidationError[] = [];
      validateStringArray([], 'SLACK_MENTION_USERS', errors);
      expect(errors).toHaveLength(0);
    });

    it('should reject mixed arrays', () => {
      const errors: ValidationError[] = [];
      validateStringArray(['@here', 3], 'SLACK_MENTION_USERS', errors);
      expect(errors[0].message).toBe('SLACK_MENTION_USERS must be an array of strings');
    });

    it('should reject a bare string', () => {
      const errors: ValidationError[] = [];
      validateStringArray('@here', 'SLACK_MENTION_USERS', errors);
      expect(errors).toHaveLength(1);
    });
  });

  describe('validateOneOf', () => {
    it('should accept a listed value', () => {
      const errors: ValidationError[] = [];
      validateOneOf('simulated', 'ADC_DRIVER', ['ads1115', 'simulated'], errors);
      expect(errors).toHaveLength(0);
    });

    it('should list allowed values on rejection', () => {
      const errors: ValidationError[] = [];
      validateOneOf('mcp3008', 'ADC_DRIVER', ['ads1115', 'simulated'], errors);
      expect(errors[0].message).toBe('ADC_DRIVER must be one of ads1115, simulated (got mcp3008)');
    });
  });

  describe('validateLogLevel', () => {
    it('should accept 0 through 3', () => {
      const errors: ValidationError[] = [];
      const warnings: ValidationWarning[] = [];
      for (let level = 0; level <= 3; level++) {
        validateLogLevel(level, 'GLOBAL_LOG_LEVEL', errors, warnings);
      }
      expect(errors).toHaveLength(0);
    });

    it('should reject 4', () => {
      const errors: ValidationError[] = [];
      validateLogLevel(4, 'GLOBAL_LOG_LEVEL', errors, []);
      expect(errors[0].message).toBe('GLOBAL_LOG_LEVEL must be between 0 and 3 (got 4)');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateNumberRange()
  // ═══════════════════════════════════════════════════════════════

  describe('validateNumberRange', () => {
    it('should skip undefined values', () => {
      const errors: ValidationError[] = [];
      const warnings: ValidationWarning[] = [];

      validateNumberRange(undefined, 'TEST', 0, 10, errors, warnings, 2, 8);

      expect(errors).toHaveLength(0);
      expect(warnings).toHaveLength(0);
    });

    it('should add error when value below minimum', () => {
      const errors: ValidationError[] = [];

      validateNumberRange(0.5, 'LEAK_THRESHOLD_PERCENT', 1, 20, errors, []);

      expect(errors[0].message).toBe('LEAK_THRESHOLD_PERCENT must be between 1 and 20 (got 0.5)');
    });

    it('should accept the boundaries', () => {
      const errors: ValidationError[] = [];

      validateNumberRange(1, 'X', 1, 20, errors, []);
      validateNumberRange(20, 'X', 1, 20, errors, []);

      expect(errors).toHaveLength(0);
    });

    it('should reject NaN and Infinity', () => {
      const errors: ValidationError[] = [];

      validateNumberRange(NaN, 'X', 0, 10, errors, []);
      validateNumberRange(Infinity, 'X', 0, 10, errors, []);

      expect(errors).toHaveLength(2);
    });

    it('should warn outside the recommended range only', () => {
      const errors: ValidationError[] = [];
      const warnings: ValidationWarning[] = [];

      validateNumberRange(15, 'LEAK_THRESHOLD_PERCENT', 1, 20, errors, warnings, 3, 10);

      expect(errors).toHaveLength(0);
      expect(warnings[0].message).toBe('LEAK_THRESHOLD_PERCENT is outside recommended range 3-10 (got 15)');
    });

    it('should not warn when the critical check already failed', () => {
      const errors: ValidationError[] = [];
      const warnings: ValidationWarning[] = [];

      validateNumberRange(25, 'X', 1, 20, errors, warnings, 3, 10);

      expect(errors).toHaveLength(1);
      expect(warnings).toHaveLength(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // validateIntegerRange()
  // ═══════════════════════════════════════════════════════════════

  describe('validateIntegerRange', () => {
    it('should reject fractions before checking the range', () => {
      const errors: ValidationError[] = [];

      validateIntegerRange(2.5, 'CONSECUTIVE_READINGS_FOR_ALERT', 1, 10, errors, []);

      expect(errors[0].message).toBe('CONSECUTIVE_READINGS_FOR_ALERT must be an integer (got 2.5)');
    });

    it('should delegate range checks', () => {
      const errors: ValidationError[] = [];

      validateIntegerRange(11, 'CONSECUTIVE_READINGS_FOR_ALERT', 1, 10, errors, []);

      expect(errors[0].message).toBe('CONSECUTIVE_READINGS_FOR_ALERT must be between 1 and 10 (got 11)');
    });
  });
});
