/**
 * Logging helper functions
 */

import type { ChalkInstance } from 'chalk';

import type { LogLevel, LogLevels } from './types';

const DEBUG_TAG = "[DEBUG]    ";
const INFO_TAG = "ℹ️ [INFO]     ";
const WARNING_TAG = "⚠️ [WARNING]  ";
const CRITICAL_TAG = "🚨 [CRITICAL] ";

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = DEBUG_TAG;
  if (level === logLevels.INFO) tag = INFO_TAG;
  if (level === logLevels.WARNING) tag = WARNING_TAG;
  if (level === logLevels.CRITICAL) tag = CRITICAL_TAG;

  return tag + msg;
}

/**
 * Check if message should be logged at the current level
 * @param level - Log level to check
 * @param currentLevel - Current minimum level
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}

/**
 * Colour a formatted line by its level tag
 *
 * DEBUG is dimmed, WARNING yellow, CRITICAL red; INFO and untagged lines
 * are left as they are.
 *
 * @param line - Output of formatLogMessage
 * @param painter - Chalk instance to colour with
 * @returns Coloured line
 */
export function colorizeLogLine(line: string, painter: ChalkInstance): string {
  if (line.startsWith(CRITICAL_TAG)) return painter.red(line);
  if (line.startsWith(WARNING_TAG)) return painter.yellow(line);
  if (line.startsWith(DEBUG_TAG)) return painter.gray(line);
  return line;
}
