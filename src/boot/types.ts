/**
 * Boot type definitions
 */

import type { ChalkInstance } from 'chalk';

import type { ConsoleAPI, FileAPI, Logger } from '@logging';
import type { IotConfig } from '$types';

/**
 * Console used during start-up, before the logger exists
 */
export interface BootConsole extends ConsoleAPI {
  error(message: string): void;
}

/**
 * External dependencies of initialize
 */
export interface BootDependencies {
  consoleApi: BootConsole;
  fileApi: FileAPI;
  /** Chalk instance for console colours, defaults to chalk's autodetected one */
  painter?: ChalkInstance;
}

/**
 * Validated configuration with a ready logger
 */
export interface Runtime {
  config: IotConfig;
  logger: Logger;
}

/**
 * Overrides taken from the command line
 */
export type CliOptions = {
  input?: string;
  frames?: string;
  window?: number;
  tolerance?: number;
  logLevel?: string;
  logFile?: string;
  color?: boolean;
  list?: boolean;
  plot?: string;
};
