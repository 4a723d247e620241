/**
 * Console output sink with start-up buffering
 *
 * Messages logged before the sink is initialized are held (up to a
 * configurable limit) and flushed in order on initialize. After that,
 * lines go straight to the console, coloured by level when enabled.
 */

import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';

import { colorizeLogLine } from '../helpers';
import type { ConsoleSink, ConsoleSinkConfig, ConsoleAPI } from '../types';

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration (bufferSize, colors)
 * @param painter - Chalk instance used when colors is on
 * @returns Console sink instance with write, initialize, getBufferSize methods
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, {
 *   bufferSize: 50,
 *   colors: true
 * });
 * consoleSink.write("held until initialize");
 * consoleSink.initialize(function() {});
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig,
  painter: ChalkInstance = chalk
): ConsoleSink {
  const buffer: string[] = [];
  let initialized = false;

  function output(formattedMessage: string) {
    consoleApi.log(config.colors ? colorizeLogLine(formattedMessage, painter) : formattedMessage);
  }

  /**
   * Write formatted message, holding it until initialized
   * @param formattedMessage - Pre-formatted log message
   */
  function write(formattedMessage: string) {
    if (initialized) {
      output(formattedMessage);
      return;
    }

    if (buffer.length < config.bufferSize) {
      buffer.push(formattedMessage);
    } else {
      consoleApi.warn('Console log buffer overflow, dropping message: ' + formattedMessage);
    }
  }

  /**
   * Get number of held messages (for testing/monitoring)
   * @returns Current buffer size
   */
  function getBufferSize(): number {
    return buffer.length;
  }

  /**
   * Flush held messages and switch to direct output
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    initialized = true;
    const held = buffer.splice(0, buffer.length);
    for (let i = 0; i < held.length; i++) {
      output(held[i]);
    }
    callback(true, 'Console sink initialized');
  }

  return {
    write: write,
    initialize: initialize,
    getBufferSize: getBufferSize
  };
}
