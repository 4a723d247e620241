/**
 * Type definition for pipeline configuration
 */

import type { LogLevel, LogLevels } from '@logging';

/**
 * User-configurable settings
 * Everything a user might reasonably tune for addressing, classification, I/O, and observability
 */
export interface IotUserConfig {
  // ───────── ADDRESSING ─────────
  readonly SOURCE_ADDRESS: string;
  readonly DESTINATION_ADDRESS: string;
  readonly ACTUATOR_ADDRESS: string;

  // ───────── CLASSIFICATION ─────────
  readonly TRAINING_WINDOW_SIZE: number;
  readonly MID_BAND_TOLERANCE: number;

  // ───────── FILES ─────────
  readonly INPUT_ROWS_PATH: string;
  readonly FRAME_FILE_PATH: string;

  // ───────── LOGGING ─────────
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly CONSOLE_COLORS: boolean;
  readonly FILE_LOG_ENABLED: boolean;
  readonly FILE_LOG_LEVEL: LogLevel;
  readonly FILE_LOG_PATH: string;
}

/**
 * Application constants
 * Internal constants that should rarely change
 */
export interface IotAppConstants {
  readonly LOG_LEVELS: LogLevels;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly FILE_BUFFER_SIZE: number;
}

/**
 * Combined configuration: user settings plus application constants
 */
export type IotConfig = IotUserConfig & IotAppConstants;
