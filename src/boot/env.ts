/**
 * Environment overrides
 * Reads .env through dotenv and applies IOT_* variables over CONFIG
 */

import * as path from 'path';

import * as dotenv from 'dotenv';

import type { LogLevel } from '@logging';
import { ValidationError } from '$types/errors';
import type { IotConfig } from '$types';

const LOG_LEVEL_NAMES: Readonly<Record<string, LogLevel>> = {
  debug: 0,
  info: 1,
  warning: 2,
  critical: 3,
  '0': 0,
  '1': 1,
  '2': 2,
  '3': 3,
};

/**
 * Load a .env file into process.env
 * Variables already set in the environment are kept.
 * @param file - Path to the .env file, defaults to ./.env
 */
export function loadDotenv(file: string = path.resolve(process.cwd(), '.env')): void {
  dotenv.config({ path: file });
}

/**
 * Parse a log level name or code
 * @param text - "debug", "info", "warning", "critical" (any case) or "0"-"3"
 * @param source - Where the value came from, for the error message
 * @throws {ValidationError} If the text names no level
 */
export function parseLogLevel(text: string, source: string): LogLevel {
  const key = text.trim().toLowerCase();
  if (Object.prototype.hasOwnProperty.call(LOG_LEVEL_NAMES, key)) {
    return LOG_LEVEL_NAMES[key];
  }
  throw new ValidationError(
    source + ' must be one of debug, info, warning, critical or 0-3 (got "' + text + '")'
  );
}

function present(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '';
}

/**
 * Apply IOT_* environment variables over a configuration
 *
 * - IOT_INPUT_ROWS: INPUT_ROWS_PATH
 * - IOT_FRAME_FILE: FRAME_FILE_PATH
 * - IOT_TRAINING_WINDOW: TRAINING_WINDOW_SIZE (checked later by validateConfig)
 * - IOT_LOG_LEVEL: GLOBAL_LOG_LEVEL and CONSOLE_LOG_LEVEL
 * - IOT_LOG_FILE: FILE_LOG_PATH, and turns the file sink on
 *
 * Empty variables are ignored.
 *
 * @param config - Base configuration
 * @param env - Environment, usually process.env
 * @returns New configuration; the base is not modified
 * @throws {ValidationError} If IOT_LOG_LEVEL names no level
 */
export function applyEnvOverrides(config: IotConfig, env: Readonly<Record<string, string | undefined>>): IotConfig {
  const inputRows = env.IOT_INPUT_ROWS;
  const frameFile = env.IOT_FRAME_FILE;
  const window = env.IOT_TRAINING_WINDOW;
  const logLevel = env.IOT_LOG_LEVEL;
  const logFile = env.IOT_LOG_FILE;

  const level = present(logLevel) ? parseLogLevel(logLevel, 'IOT_LOG_LEVEL') : null;

  return {
    ...config,
    INPUT_ROWS_PATH: present(inputRows) ? inputRows : config.INPUT_ROWS_PATH,
    FRAME_FILE_PATH: present(frameFile) ? frameFile : config.FRAME_FILE_PATH,
    TRAINING_WINDOW_SIZE: present(window) ? Number(window) : config.TRAINING_WINDOW_SIZE,
    GLOBAL_LOG_LEVEL: level ?? config.GLOBAL_LOG_LEVEL,
    CONSOLE_LOG_LEVEL: level ?? config.CONSOLE_LOG_LEVEL,
    FILE_LOG_ENABLED: present(logFile) ? true : config.FILE_LOG_ENABLED,
    FILE_LOG_PATH: present(logFile) ? logFile : config.FILE_LOG_PATH,
  };
}
