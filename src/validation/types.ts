/**
 * Result shapes for configuration validation
 */

/** A setting the pipeline cannot start with */
export interface ValidationError {
  readonly level: 'CRITICAL';
  readonly field: string;
  readonly message: string;
}

/** A setting outside its recommended range; the pipeline still starts */
export interface ValidationWarning {
  readonly level: 'WARNING';
  readonly field: string;
  readonly message: string;
}

export interface ValidationResult {
  /** True when there are no errors; warnings do not count */
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}
