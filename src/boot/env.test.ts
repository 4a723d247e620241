/**
 * Tests for environment overrides
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { ValidationError } from '$types/errors';

import CONFIG from './config';
import { applyEnvOverrides, loadDotenv, parseLogLevel } from './env';

describe('parseLogLevel', () => {
  it('should accept names in any case and numeric codes', () => {
    expect(parseLogLevel('debug', 'X')).toBe(0);
    expect(parseLogLevel('INFO', 'X')).toBe(1);
    expect(parseLogLevel(' Warning ', 'X')).toBe(2);
    expect(parseLogLevel('3', 'X')).toBe(3);
  });

  it('should reject anything else', () => {
    expect(() => parseLogLevel('verbose', 'IOT_LOG_LEVEL')).toThrow(ValidationError);
    expect(() => parseLogLevel('4', 'IOT_LOG_LEVEL')).toThrow(
      'IOT_LOG_LEVEL must be one of debug, info, warning, critical or 0-3 (got "4")'
    );
  });
});

describe('applyEnvOverrides', () => {
  it('should return the configuration unchanged for an empty environment', () => {
    expect(applyEnvOverrides(CONFIG, {})).toEqual(CONFIG);
  });

  it('should apply paths, window and log level', () => {
    const config = applyEnvOverrides(CONFIG, {
      IOT_INPUT_ROWS: 'data/rows.csv',
      IOT_FRAME_FILE: 'data/frames.bin',
      IOT_TRAINING_WINDOW: '48',
      IOT_LOG_LEVEL: 'debug',
    });

    expect(config.INPUT_ROWS_PATH).toBe('data/rows.csv');
    expect(config.FRAME_FILE_PATH).toBe('data/frames.bin');
    expect(config.TRAINING_WINDOW_SIZE).toBe(48);
    expect(config.GLOBAL_LOG_LEVEL).toBe(0);
    expect(config.CONSOLE_LOG_LEVEL).toBe(0);
  });

  it('should turn on the file sink when a log file is named', () => {
    const config = applyEnvOverrides(CONFIG, { IOT_LOG_FILE: 'out/run.log' });

    expect(config.FILE_LOG_ENABLED).toBe(true);
    expect(config.FILE_LOG_PATH).toBe('out/run.log');
  });

  it('should pass an unparseable window through for validation', () => {
    expect(applyEnvOverrides(CONFIG, { IOT_TRAINING_WINDOW: 'many' }).TRAINING_WINDOW_SIZE).toBeNaN();
  });

  it('should ignore empty variables', () => {
    expect(applyEnvOverrides(CONFIG, { IOT_INPUT_ROWS: '', IOT_LOG_LEVEL: ' ' })).toEqual(CONFIG);
  });

  it('should not modify the base configuration', () => {
    applyEnvOverrides(CONFIG, { IOT_INPUT_ROWS: 'elsewhere.csv' });
    expect(CONFIG.INPUT_ROWS_PATH).toBe('input/data.csv');
  });
});

describe('loadDotenv', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'iot-env-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    delete process.env.IOT_TEST_FROM_FILE;
    delete process.env.IOT_TEST_ALREADY_SET;
  });

  it('should load variables without replacing ones already set', () => {
    const file = join(dir, '.env');
    writeFileSync(file, 'IOT_TEST_FROM_FILE=rows.csv\nIOT_TEST_ALREADY_SET=from-file\n');
    process.env.IOT_TEST_ALREADY_SET = 'from-shell';

    loadDotenv(file);

    expect(process.env.IOT_TEST_FROM_FILE).toBe('rows.csv');
    expect(process.env.IOT_TEST_ALREADY_SET).toBe('from-shell');
  });

  it('should do nothing when the file is missing', () => {
    expect(() => loadDotenv(join(dir, 'missing.env'))).not.toThrow();
  });
});
