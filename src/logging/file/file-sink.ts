/**
 * Log file output sink
 *
 * Appends one line per message to a log file. The directory is created on
 * initialize; messages written before then are held and flushed. When the
 * directory cannot be created the sink reports failure and drops writes.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

import type { FileAPI, FileSink, FileSinkConfig } from '../types';

/**
 * File API backed by node fs
 * @returns FileAPI using synchronous fs calls
 */
export function createNodeFileApi(): FileAPI {
  return {
    ensureDir: function(path: string) {
      mkdirSync(path, { recursive: true });
    },
    append: function(path: string, text: string) {
      appendFileSync(path, text, 'utf8');
    }
  };
}

/**
 * Create a log file sink
 *
 * @param fileApi - File system API
 * @param config - Sink configuration (path, bufferSize)
 * @returns File sink instance
 *
 * @example
 * ```typescript
 * const fileSink = createFileSink(createNodeFileApi(), {
 *   path: "logs/pipeline.log",
 *   bufferSize: 50
 * });
 * fileSink.initialize(function(ok, message) { console.log(message); });
 * ```
 */
export function createFileSink(fileApi: FileAPI, config: FileSinkConfig): FileSink {
  const buffer: string[] = [];
  let initialized = false;
  let failed = false;

  function append(formattedMessage: string) {
    fileApi.append(config.path, formattedMessage + '\n');
  }

  /**
   * Append formatted message, holding it until initialized
   * @param formattedMessage - Pre-formatted log message
   */
  function write(formattedMessage: string) {
    if (failed) {
      return;
    }
    if (initialized) {
      append(formattedMessage);
      return;
    }
    if (buffer.length < config.bufferSize) {
      buffer.push(formattedMessage);
    }
  }

  /**
   * Check if sink is initialized
   * @returns True once the log directory exists
   */
  function isInitialized(): boolean {
    return initialized;
  }

  /**
   * Get number of held messages (for testing/monitoring)
   * @returns Current buffer size
   */
  function getBufferSize(): number {
    return buffer.length;
  }

  /**
   * Create the log directory and flush held messages
   * @param callback - Called with (success, message)
   */
  function initialize(callback: (success: boolean, message: string) => void): void {
    try {
      fileApi.ensureDir(dirname(config.path));
    } catch (err) {
      failed = true;
      buffer.length = 0;
      callback(false, 'File sink disabled: ' + (err instanceof Error ? err.message : String(err)));
      return;
    }

    initialized = true;
    const held = buffer.splice(0, buffer.length);
    for (let i = 0; i < held.length; i++) {
      append(held[i]);
    }
    callback(true, 'File sink writing to ' + config.path);
  }

  return {
    write: write,
    initialize: initialize,
    isInitialized: isInitialized,
    getBufferSize: getBufferSize
  };
}
