/**
 * Global error types for the sensor frame pipeline
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a frame address is not exactly six printable ASCII characters
 */
export class AddressValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'AddressValidationError';
  }
}

/**
 * Error thrown when a sensor reading cannot be represented on the wire
 */
export class ReadingValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'ReadingValidationError';
  }
}

/**
 * Error thrown when a delimited input row cannot be parsed
 */
export class RowParseError extends ValidationError {
  /** 1-based line number of the offending row */
  readonly line: number;

  constructor(line: number, message: string) {
    super('line ' + line + ': ' + message);
    this.name = 'RowParseError';
    this.line = line;
  }
}

// ═══════════════════════════════════════════════════════════════
// PIPELINE ERRORS
// Codec, stream and training failures. Each carries a `kind` so
// decode results can be matched without instanceof chains.
// ═══════════════════════════════════════════════════════════════

export type PipelineErrorKind =
  | 'MalformedPayload'
  | 'InvalidFrame'
  | 'TruncatedStream'
  | 'SequenceOverflow'
  | 'EmptyTrainingWindow';

/**
 * Base error for codec, stream and training failures
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
  }
}

/**
 * Payload bytes are too short, the timestamp field is unparseable or a reading is not finite
 */
export class MalformedPayloadError extends PipelineError {
  constructor(message: string) {
    super('MalformedPayload', message);
    this.name = 'MalformedPayloadError';
  }
}

/**
 * Stored checksum does not match the MD5 of the payload (corruption or tampering)
 */
export class InvalidFrameError extends PipelineError {
  /** Sequence number from the rejected frame's header */
  readonly sequence: number;

  constructor(sequence: number, message: string) {
    super('InvalidFrame', message);
    this.name = 'InvalidFrameError';
    this.sequence = sequence;
  }
}

/**
 * Stream ends with a partial record
 */
export class TruncatedStreamError extends PipelineError {
  /** Byte count of the trailing partial record */
  readonly remaining: number;

  constructor(remaining: number, message: string) {
    super('TruncatedStream', message);
    this.name = 'TruncatedStreamError';
    this.remaining = remaining;
  }
}

/**
 * Sequence number does not fit the 32-bit unsigned header field
 */
export class SequenceOverflowError extends PipelineError {
  constructor(message: string) {
    super('SequenceOverflow', message);
    this.name = 'SequenceOverflowError';
  }
}

/**
 * Classifier training was given no frames
 */
export class EmptyTrainingWindowError extends PipelineError {
  constructor(message: string) {
    super('EmptyTrainingWindow', message);
    this.name = 'EmptyTrainingWindowError';
  }
}
