/**
 * Validation helper functions
 * Provides reusable utilities for configuration validation
 */

import { isFiniteNumber, isInteger } from '@utils/number';
import type { ValidationIssue } from './types';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error to the errors list
 * @param errors - Array to append the error to
 * @param field - Field name that failed validation
 * @param message - Human-readable error message
 */
export function addError(errors: ValidationIssue[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning to the warnings list
 * @param warnings - Array to append the warning to
 * @param field - Field name with sub-optimal value
 * @param message - Human-readable warning message
 */
export function addWarning(warnings: ValidationIssue[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

/**
 * Render issues as "field: message" lines
 */
export function describeIssues(issues: readonly ValidationIssue[]): string[] {
  return issues.map(function(issue) {
    return issue.field + ': ' + issue.message;
  });
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a non-empty string
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 */
export function validateNonEmptyString(
  value: unknown,
  field: string,
  errors: ValidationIssue[]
): void {
  if (typeof value !== 'string' || value.trim() === '') {
    addError(errors, field, `${field} must be a non-empty string`);
  }
}

/**
 * Validate that a value is a finite number
 * @param value - Value to validate
 * @param field - Field name for error messages
 * @param errors - Array to append errors to
 * @returns True when the value is usable as a number
 */
export function validateFinite(
  value: unknown,
  field: string,
  errors: ValidationIssue[]
): value is number {
  if (!isFiniteNumber(value)) {
    addError(errors, field, `${field} must be a finite number (got ${String(value)})`);
    return false;
  }
  return true;
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
  errors: ValidationIssue[],
  warnings: ValidationIssue[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  // NaN and Infinity fail the critical range
  if (!isFiniteNumber(value) || value < criticalMin || value > criticalMax) {
    addError(
      errors,
      field,
      `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`
    );
    return;
  }

  if (recommendedMin !== undefined && recommendedMax !== undefined) {
    if (value < recommendedMin || value > recommendedMax) {
      addWarning(
        warnings,
        field,
        `${field} is outside recommended range ${recommendedMin}-${recommendedMax} (got ${value})`
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
  errors: ValidationIssue[],
  warnings: ValidationIssue[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
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
