/**
 * Validation helper functions
 * Each check appends to the issue lists instead of throwing, so one pass reports everything
 */

import type { RangeRule, ValidationIssue } from './types';
import { isFiniteNumber, isInteger } from '@utils/number';

// ═══════════════════════════════════════════════════════════════
// ISSUE BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Record a critical issue (validation fails)
 */
export function addError(errors: ValidationIssue[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Record a warning (validation passes)
 */
export function addWarning(warnings: ValidationIssue[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// VALUE CHECKS
// ═══════════════════════════════════════════════════════════════

/**
 * Check a number against a critical range, then its recommended range
 *
 * @param value - Value to check
 * @param field - Config key, used in messages
 * @param rule - Bounds
 * @param errors - Critical issues
 * @param warnings - Warnings
 * @returns True if the value is within the critical range
 */
export function checkRange(
  value: number,
  field: string,
  rule: RangeRule,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): boolean {
  if (!isFiniteNumber(value) || value < rule.min || value > rule.max) {
    addError(errors, field, `${field} must be between ${rule.min} and ${rule.max} (got ${value})`);
    return false;
  }

  if (rule.recommendedMin !== undefined && rule.recommendedMax !== undefined) {
    if (value < rule.recommendedMin || value > rule.recommendedMax) {
      addWarning(
        warnings,
        field,
        `${field} is outside recommended range ${rule.recommendedMin}-${rule.recommendedMax} (got ${value})`
      );
    }
  }

  return true;
}

/**
 * Same as checkRange, but the value must also be an integer
 */
export function checkIntegerRange(
  value: number,
  field: string,
  rule: RangeRule,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): boolean {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return false;
  }
  return checkRange(value, field, rule, errors, warnings);
}

/**
 * Check that a value is a boolean
 */
export function checkBoolean(value: unknown, field: string, errors: ValidationIssue[]): void {
  if (typeof value !== 'boolean') {
    addError(errors, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

/**
 * Check that a string is an absolute http or https URL
 *
 * @returns True if the URL is usable
 */
export function checkHttpUrl(value: string, field: string, errors: ValidationIssue[]): boolean {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (_err) {
    addError(errors, field, `${field} must be an absolute URL (got '${value}')`);
    return false;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    addError(errors, field, `${field} must use http or https (got '${parsed.protocol}')`);
    return false;
  }
  return true;
}

/**
 * Find entries that appear more than once, in first-repeat order
 */
export function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated: string[] = [];
  for (let i = 0; i < values.length; i++) {
    if (seen.has(values[i]) && repeated.indexOf(values[i]) === -1) {
      repeated.push(values[i]);
    }
    seen.add(values[i]);
  }
  return repeated;
}
