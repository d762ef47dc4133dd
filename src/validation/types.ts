/**
 * Configuration validation types
 */

export type ValidationLevel = 'CRITICAL' | 'WARNING';

export interface ValidationIssue {
  level: ValidationLevel;
  field: string;
  message: string;
}

export interface ValidationResult {
  /** False when at least one CRITICAL issue was found */
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Critical (error) and optional recommended (warning) bounds, inclusive
 */
export interface RangeRule {
  min: number;
  max: number;
  recommendedMin?: number;
  recommendedMax?: number;
}
