export { validateConfig } from './validator';
export {
  addError,
  addWarning,
  validateAddressField,
  validateBoolean,
  validateIntegerRange,
  validateLogLevel,
  validateNonEmptyString,
  validateNumberRange,
  validatePositiveNumber
} from './helpers';
export type { ValidationError, ValidationResult, ValidationWarning } from './types';
