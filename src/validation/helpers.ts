/**
 * Validation helper functions
 * Provides reusable utilities for configuration and settings validation
 */

import type { ValidationError, ValidationWarning } from './types';
import { isFiniteNumber, isInteger } from '@utils/number';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a boolean
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateBoolean(
  value: unknown,
  field: string,
  errors: ValidationError[]
): void {
  if (value !== undefined && typeof value !== 'boolean') {
    addError(errors, field, field + ' must be a boolean (got ' + typeof value + ')');
  }
}

/**
 * Validate that a value is a non-empty (after trimming) string
 */
export function validateNonEmptyString(
  value: unknown,
  field: string,
  errors: ValidationError[]
): void {
  if (value === undefined) return;

  if (typeof value !== 'string' || value.trim() === '') {
    addError(errors, field, field + ' must be a non-empty string');
  }
}

/**
 * Validate that a value is an array of strings
 */
export function validateStringArray(
  value: unknown,
  field: string,
  errors: ValidationError[]
): void {
  if (value === undefined) return;

  if (!Array.isArray(value) || !value.every(function(item) { return typeof item === 'string'; })) {
    addError(errors, field, field + ' must be an array of strings');
  }
}

/**
 * Validate that a value is one of a fixed set of strings
 */
export function validateOneOf(
  value: unknown,
  field: string,
  allowed: readonly string[],
  errors: ValidationError[]
): void {
  if (value === undefined) return;

  if (typeof value !== 'string' || allowed.indexOf(value) === -1) {
    addError(errors, field, field + ' must be one of ' + allowed.join(', ') + ' (got ' + String(value) + ')');
  }
}

/**
 * Validate a log level (integer 0..3)
 */
export function validateLogLevel(
  value: number | undefined,
  field: string,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  validateIntegerRange(value, field, 0, 3, errors, warnings);
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against critical and recommended ranges
 *
 * Critical range violations produce errors (validation fails)
 * Recommended range violations produce warnings (validation passes)
 *
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 */
export function validateNumberRange(
  value: number | undefined,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  if (!isFiniteNumber(value) || value < criticalMin || value > criticalMax) {
    addError(
      errors,
      field,
      field + ' must be between ' + criticalMin + ' and ' + criticalMax + ' (got ' + value + ')'
    );
    return; // Don't check recommended if critical failed
  }

  if (recommendedMin !== undefined && recommendedMax !== undefined) {
    if (value < recommendedMin || value > recommendedMax) {
      addWarning(
        warnings,
        field,
        field + ' is outside recommended range ' + recommendedMin + '-' + recommendedMax + ' (got ' + value + ')'
      );
    }
  }
}

/**
 * Validate an integer against critical and recommended ranges
 *
 * First checks if the value is an integer, then validates ranges
 *
 * @param value - Value to validate (skips if undefined)
 * @param field - Field name for error messages
 * @param criticalMin - Minimum acceptable value (hard limit)
 * @param criticalMax - Maximum acceptable value (hard limit)
 * @param errors - Array to append errors to
 * @param warnings - Array to append warnings to
 * @param recommendedMin - Recommended minimum value (optional)
 * @param recommendedMax - Recommended maximum value (optional)
 */
export function validateIntegerRange(
  value: number | undefined,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  if (!isInteger(value)) {
    addError(errors, field, field + ' must be an integer (got ' + value + ')');
    return;
  }

  validateNumberRange(
    value,
    field,
    criticalMin,
    criticalMax,
    errors,
    warnings,
    recommendedMin,
    recommendedMax
  );
}
