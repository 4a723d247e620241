/**
 * Tests for configuration validator
 */

import { validateConfig } from './validator';
import type { IotUserConfig } from '../types';

// Valid base configuration for testing
const validConfig: IotUserConfig = {
  SOURCE_ADDRESS: '013A5B',
  DESTINATION_ADDRESS: '014D8E',
  ACTUATOR_ADDRESS: '025C8H',
  TRAINING_WINDOW_SIZE: 24,
  MID_BAND_TOLERANCE: 1.5,
  INPUT_ROWS_PATH: 'input/data.csv',
  FRAME_FILE_PATH: 'input/frames.bin',
  GLOBAL_LOG_LEVEL: 1,
  CONSOLE_ENABLED: true,
  CONSOLE_LOG_LEVEL: 1,
  CONSOLE_COLORS: true,
  FILE_LOG_ENABLED: false,
  FILE_LOG_LEVEL: 0,
  FILE_LOG_PATH: 'logs/pipeline.log',
};

function messagesFor(config: IotUserConfig) {
  const result = validateConfig(config);
  return {
    valid: result.valid,
    errors: result.errors.map((e) => e.field + ': ' + e.message),
    warnings: result.warnings.map((w) => w.field + ': ' + w.message),
  };
}

describe('validateConfig', () => {
  it('should accept the valid base configuration without warnings', () => {
    expect(messagesFor(validConfig)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  describe('addresses', () => {
    it('should reject an address of the wrong length', () => {
      const result = messagesFor({ ...validConfig, SOURCE_ADDRESS: '013A5' });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'SOURCE_ADDRESS: SOURCE_ADDRESS must be exactly 6 printable ASCII characters (got "013A5")',
      ]);
    });

    it('should reject a non-ASCII destination', () => {
      const result = messagesFor({ ...validConfig, DESTINATION_ADDRESS: '01°D8E' });
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^DESTINATION_ADDRESS: /);
    });

    it('should tag errors as CRITICAL and warnings as WARNING', () => {
      const result = validateConfig({ ...validConfig, SOURCE_ADDRESS: '013A5', TRAINING_WINDOW_SIZE: 200 });

      expect(result.errors.map((e) => e.level + ' ' + e.field)).toEqual(['CRITICAL SOURCE_ADDRESS']);
      expect(result.warnings.map((w) => w.level + ' ' + w.field)).toEqual(['WARNING TRAINING_WINDOW_SIZE']);
    });

    it('should warn when the actuator is the sensor itself', () => {
      const result = messagesFor({ ...validConfig, ACTUATOR_ADDRESS: '013A5B' });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        'ACTUATOR_ADDRESS: ACTUATOR_ADDRESS equals SOURCE_ADDRESS; signal frames would loop back to the sensor',
      ]);
    });
  });

  describe('classification', () => {
    it('should reject a zero training window', () => {
      const result = messagesFor({ ...validConfig, TRAINING_WINDOW_SIZE: 0 });
      expect(result.errors).toEqual([
        'TRAINING_WINDOW_SIZE: TRAINING_WINDOW_SIZE must be between 1 and ' + Number.MAX_SAFE_INTEGER + ' (got 0)',
      ]);
    });

    it('should reject a fractional or unparsed training window', () => {
      expect(messagesFor({ ...validConfig, TRAINING_WINDOW_SIZE: 2.5 }).errors).toEqual([
        'TRAINING_WINDOW_SIZE: TRAINING_WINDOW_SIZE must be an integer (got 2.5)',
      ]);
      expect(messagesFor({ ...validConfig, TRAINING_WINDOW_SIZE: NaN }).errors).toEqual([
        'TRAINING_WINDOW_SIZE: TRAINING_WINDOW_SIZE must be an integer (got NaN)',
      ]);
    });

    it('should warn about a training window longer than a week', () => {
      const result = messagesFor({ ...validConfig, TRAINING_WINDOW_SIZE: 200 });

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        'TRAINING_WINDOW_SIZE: TRAINING_WINDOW_SIZE is outside recommended range 1-168 (got 200)',
      ]);
    });

    it('should reject a non-positive tolerance', () => {
      expect(messagesFor({ ...validConfig, MID_BAND_TOLERANCE: 0 }).errors).toEqual([
        'MID_BAND_TOLERANCE: MID_BAND_TOLERANCE must be a positive number (got 0)',
      ]);
      expect(messagesFor({ ...validConfig, MID_BAND_TOLERANCE: Infinity }).valid).toBe(false);
    });

    it('should warn about a wide tolerance', () => {
      expect(messagesFor({ ...validConfig, MID_BAND_TOLERANCE: 8 }).warnings).toEqual([
        'MID_BAND_TOLERANCE: MID_BAND_TOLERANCE is outside recommended range 0.5-5 (got 8)',
      ]);
    });
  });

  describe('files', () => {
    it('should reject an empty input path', () => {
      expect(messagesFor({ ...validConfig, INPUT_ROWS_PATH: '  ' }).errors).toEqual([
        'INPUT_ROWS_PATH: INPUT_ROWS_PATH must be a non-empty string',
      ]);
    });

    it('should reject writing frames over the input rows', () => {
      expect(messagesFor({ ...validConfig, FRAME_FILE_PATH: 'input/data.csv' }).errors).toEqual([
        'FRAME_FILE_PATH: FRAME_FILE_PATH must differ from INPUT_ROWS_PATH',
      ]);
    });
  });

  describe('logging', () => {
    it('should reject an unknown log level', () => {
      expect(messagesFor(Object.assign({}, validConfig, { CONSOLE_LOG_LEVEL: 5 })).errors).toEqual([
        'CONSOLE_LOG_LEVEL: CONSOLE_LOG_LEVEL must be one of 0 (DEBUG), 1 (INFO), 2 (WARNING), 3 (CRITICAL) (got 5)',
      ]);
    });

    it('should require a log path only when file logging is on', () => {
      expect(messagesFor({ ...validConfig, FILE_LOG_PATH: '' }).valid).toBe(true);
      expect(messagesFor({ ...validConfig, FILE_LOG_ENABLED: true, FILE_LOG_PATH: '' }).errors).toEqual([
        'FILE_LOG_PATH: FILE_LOG_PATH must be a non-empty string',
      ]);
    });

    it('should warn when every sink is disabled', () => {
      expect(messagesFor({ ...validConfig, CONSOLE_ENABLED: false }).warnings).toEqual([
        'CONSOLE_ENABLED: All log sinks are disabled',
      ]);
    });
  });

  it('should collect several errors at once', () => {
    const result = messagesFor({
      ...validConfig,
      SOURCE_ADDRESS: '',
      TRAINING_WINDOW_SIZE: -3,
      MID_BAND_TOLERANCE: -1,
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(3);
  });
});
