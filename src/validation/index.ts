export { validateConfig, RANGES } from './validator';
export { addError, addWarning, checkBoolean, checkHttpUrl, checkIntegerRange, checkRange, findDuplicates } from './helpers';
export type { RangeRule, ValidationIssue, ValidationLevel, ValidationResult } from './types';
