/**
 * Main logger coordinator
 *
 * Combines filtering, formatting, and output sinks into a unified logging system.
 * The logger routes messages through filters and formatters before writing to sinks.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Multiple output sinks (console, log file)
 * - Runtime level adjustment
 * - Callback-based sink initialization
 */

import { formatLogMessage, shouldLog } from './helpers';
import type {
  InitMessage,
  LogLevel,
  LogLevels,
  LogSink,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel
} from './types';

/**
 * Create a logger instance
 *
 * The logger coordinates filtering, formatting, and output to multiple sinks.
 * Each message is:
 * 1. Checked against the current log level
 * 2. Formatted with a level-appropriate tag
 * 3. Written to every sink whose minimum level it meets
 *
 * @param config - Logger configuration (level)
 * @param dependencies - External dependencies (sinks, console for sink failures)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO },
 *   {
 *     consoleApi: console,
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.INFO },
 *       { sink: fileSink, minLevel: LOG_LEVELS.DEBUG }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.info("Trained on 24 frames");
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const consoleApi = dependencies.consoleApi;

  function log(level: LogLevel, msg: string) {
    if (!shouldLog(level, currentLevel)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    // Write to sinks that meet the level threshold
    for (let i = 0; i < sinks.length; i++) {
      if (!shouldLog(level, sinks[i].minLevel)) {
        continue;
      }

      try {
        sinks[i].sink.write(formattedMessage);
      } catch (err) {
        // Sink errors should not crash the logger
        consoleApi.warn('Logger sink error: ' + String(err));
      }
    }
  }

  /**
   * Log DEBUG level message
   * Use for detailed diagnostic information during development
   * @param msg - Message to log
   */
  function debug(msg: string): void {
    log(logLevels.DEBUG, msg);
  }

  /**
   * Log INFO level message
   * Use for general operational information
   * @param msg - Message to log
   */
  function info(msg: string): void {
    log(logLevels.INFO, msg);
  }

  /**
   * Log WARNING level message
   * Use for potentially harmful situations that need attention
   * @param msg - Message to log
   */
  function warning(msg: string): void {
    log(logLevels.WARNING, msg);
  }

  /**
   * Log CRITICAL level message
   * Use for failures that end the run
   * @param msg - Message to log
   */
  function critical(msg: string): void {
    log(logLevels.CRITICAL, msg);
  }

  /**
   * Update log level at runtime
   * @param newLevel - New log level (0-3)
   */
  function setLevel(newLevel: LogLevel) {
    currentLevel = newLevel;
  }

  /**
   * Get current log level
   * @returns Current log level
   */
  function getLevel(): LogLevel {
    return currentLevel;
  }

  /**
   * Initialize all sinks
   * @param callback - Called once every sink has reported, with (success, messages[]);
   *   individual sink failures are carried in messages
   */
  function initialize(callback: (success: boolean, messages: InitMessage[]) => void): void {
    const messages: InitMessage[] = [];
    const pending: LogSink[] = [];

    // Count sinks that need initialization
    for (let i = 0; i < sinks.length; i++) {
      if (sinks[i].sink.initialize) {
        pending.push(sinks[i].sink);
      }
    }

    if (pending.length === 0) {
      callback(true, messages);
      return;
    }

    let completed = 0;

    function onSinkReady(success: boolean, message: string) {
      messages.push({ success: success, message: message });
      completed++;
      if (completed === pending.length) {
        callback(true, messages);
      }
    }

    for (let i = 0; i < pending.length; i++) {
      pending[i].initialize?.(onSinkReady);
    }
  }

  return {
    log: log,
    debug: debug,
    info: info,
    warning: warning,
    critical: critical,
    setLevel: setLevel,
    getLevel: getLevel,
    initialize: initialize
  };
}
