/**
 * Tests for error types
 */

import {
  ValidationError,
  AddressValidationError,
  ReadingValidationError,
  RowParseError,
  PipelineError,
  MalformedPayloadError,
  InvalidFrameError,
  TruncatedStreamError,
  SequenceOverflowError,
  EmptyTrainingWindowError
} from './errors';

describe('Error Types', () => {
  describe('ValidationError', () => {
    it('should create error with correct message', () => {
      const error = new ValidationError('Test error message');
      expect(error.message).toBe('Test error message');
    });

    it('should have correct name', () => {
      expect(new ValidationError('Test').name).toBe('ValidationError');
    });

    it('should be instance of Error', () => {
      expect(new ValidationError('Test')).toBeInstanceOf(Error);
    });
  });

  describe('validation subclasses', () => {
    it('should name AddressValidationError', () => {
      const error = new AddressValidationError('bad address');
      expect(error.name).toBe('AddressValidationError');
      expect(error).toBeInstanceOf(ValidationError);
    });

    it('should name ReadingValidationError', () => {
      const error = new ReadingValidationError('bad reading');
      expect(error.name).toBe('ReadingValidationError');
      expect(error).toBeInstanceOf(ValidationError);
    });

    it('should prefix RowParseError with the line number', () => {
      const error = new RowParseError(7, 'expected 3 fields, got 2');
      expect(error.message).toBe('line 7: expected 3 fields, got 2');
      expect(error.line).toBe(7);
      expect(error).toBeInstanceOf(ValidationError);
    });
  });

  describe('PipelineError kinds', () => {
    it('should tag each subclass with its kind', () => {
      expect(new MalformedPayloadError('x').kind).toBe('MalformedPayload');
      expect(new InvalidFrameError(3, 'x').kind).toBe('InvalidFrame');
      expect(new TruncatedStreamError(10, 'x').kind).toBe('TruncatedStream');
      expect(new SequenceOverflowError('x').kind).toBe('SequenceOverflow');
      expect(new EmptyTrainingWindowError('x').kind).toBe('EmptyTrainingWindow');
    });

    it('should keep subclass names', () => {
      expect(new MalformedPayloadError('x').name).toBe('MalformedPayloadError');
      expect(new InvalidFrameError(3, 'x').name).toBe('InvalidFrameError');
      expect(new TruncatedStreamError(10, 'x').name).toBe('TruncatedStreamError');
      expect(new SequenceOverflowError('x').name).toBe('SequenceOverflowError');
      expect(new EmptyTrainingWindowError('x').name).toBe('EmptyTrainingWindowError');
    });

    it('should all be PipelineError instances', () => {
      expect(new InvalidFrameError(1, 'x')).toBeInstanceOf(PipelineError);
      expect(new TruncatedStreamError(1, 'x')).toBeInstanceOf(Error);
    });

    it('should carry frame details', () => {
      expect(new InvalidFrameError(42, 'x').sequence).toBe(42);
      expect(new TruncatedStreamError(10, 'x').remaining).toBe(10);
    });
  });
});
