export { validateGameRules, validateFuzzySystem } from './validator';
export {
  addError,
  addWarning,
  describeIssues,
  validateNonEmptyString,
  validateFinite,
  validateNumberRange,
  validateIntegerRange
} from './helpers';
export type { ValidationIssue, ValidationResult } from './types';
