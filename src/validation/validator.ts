/**
 * Configuration validator
 *
 * Hard limits produce errors and stop start-up; values outside the
 * recommended ranges produce warnings only.
 */

import type { IotUserConfig } from '$types';

import {
  addError,
  addWarning,
  validateAddressField,
  validateBoolean,
  validateIntegerRange,
  validateLogLevel,
  validateNonEmptyString,
  validatePositiveNumber
} from './helpers';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';

export function validateConfig(config: IotUserConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // Addresses
  validateAddressField(config.SOURCE_ADDRESS, 'SOURCE_ADDRESS', errors);
  validateAddressField(config.DESTINATION_ADDRESS, 'DESTINATION_ADDRESS', errors);
  validateAddressField(config.ACTUATOR_ADDRESS, 'ACTUATOR_ADDRESS', errors);
  if (config.ACTUATOR_ADDRESS === config.SOURCE_ADDRESS) {
    addWarning(warnings, 'ACTUATOR_ADDRESS', 'ACTUATOR_ADDRESS equals SOURCE_ADDRESS; signal frames would loop back to the sensor');
  }

  // Classification: one week of hourly samples is the recommended ceiling
  validateIntegerRange(
    config.TRAINING_WINDOW_SIZE,
    'TRAINING_WINDOW_SIZE',
    1,
    Number.MAX_SAFE_INTEGER,
    errors,
    warnings,
    1,
    168
  );
  validatePositiveNumber(config.MID_BAND_TOLERANCE, 'MID_BAND_TOLERANCE', errors, warnings, 0.5, 5);

  // Files
  validateNonEmptyString(config.INPUT_ROWS_PATH, 'INPUT_ROWS_PATH', errors);
  validateNonEmptyString(config.FRAME_FILE_PATH, 'FRAME_FILE_PATH', errors);
  if (config.INPUT_ROWS_PATH === config.FRAME_FILE_PATH) {
    addError(errors, 'FRAME_FILE_PATH', 'FRAME_FILE_PATH must differ from INPUT_ROWS_PATH');
  }

  // Logging
  validateLogLevel(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', errors);
  validateLogLevel(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', errors);
  validateLogLevel(config.FILE_LOG_LEVEL, 'FILE_LOG_LEVEL', errors);
  validateBoolean(config.CONSOLE_ENABLED, 'CONSOLE_ENABLED', errors);
  validateBoolean(config.CONSOLE_COLORS, 'CONSOLE_COLORS', errors);
  validateBoolean(config.FILE_LOG_ENABLED, 'FILE_LOG_ENABLED', errors);
  if (config.FILE_LOG_ENABLED) {
    validateNonEmptyString(config.FILE_LOG_PATH, 'FILE_LOG_PATH', errors);
  }
  if (!config.CONSOLE_ENABLED && !config.FILE_LOG_ENABLED) {
    addWarning(warnings, 'CONSOLE_ENABLED', 'All log sinks are disabled');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}
