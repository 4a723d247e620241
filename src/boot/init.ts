/**
 * Pipeline initialization
 */

import { createConsoleSink, createFileSink, createLogger } from '@logging';
import type { InitMessage, SinkWithLevel } from '@logging';
import { validateConfig } from '@validation';
import type { IotConfig } from '$types';

import type { BootDependencies, Runtime } from './types';

/**
 * Validate configuration and build the logger
 *
 * Validation errors are printed and stop start-up; warnings are printed and
 * start-up continues. Sinks that fail to initialize are reported as warnings
 * once the logger is up.
 *
 * @param config - Combined configuration
 * @param deps - Console and file system
 * @param onReady - Called once every sink has initialized
 * @returns Runtime, or null when the configuration is invalid
 */
export function initialize(
  config: IotConfig,
  deps: BootDependencies,
  onReady?: (runtime: Runtime) => void
): Runtime | null {
  const consoleApi = deps.consoleApi;

  // Validate configuration
  const validation = validateConfig(config);

  if (!validation.valid) {
    consoleApi.error("INIT FAIL: Invalid configuration");
    validation.errors.forEach(function(err) {
      consoleApi.error("  [" + err.field + "]: " + err.message);
    });
    return null;
  }

  if (validation.warnings.length > 0) {
    validation.warnings.forEach(function(warn) {
      consoleApi.warn("  [" + warn.field + "]: " + warn.message);
    });
  }

  // Setup logging
  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    const consoleSink = createConsoleSink(consoleApi, {
      bufferSize: config.CONSOLE_BUFFER_SIZE,
      colors: config.CONSOLE_COLORS
    }, deps.painter);
    sinks.push({ sink: consoleSink, minLevel: config.CONSOLE_LOG_LEVEL });
  }
  if (config.FILE_LOG_ENABLED) {
    const fileSink = createFileSink(deps.fileApi, {
      path: config.FILE_LOG_PATH,
      bufferSize: config.FILE_BUFFER_SIZE
    });
    sinks.push({ sink: fileSink, minLevel: config.FILE_LOG_LEVEL });
  }

  const logger = createLogger({
    level: config.GLOBAL_LOG_LEVEL
  }, {
    consoleApi: consoleApi,
    sinks: sinks
  }, config.LOG_LEVELS);

  const runtime: Runtime = { config: config, logger: logger };

  logger.initialize(function(_success: boolean, messages: InitMessage[]) {
    logger.debug(
      "Window " + config.TRAINING_WINDOW_SIZE + " | tolerance " + config.MID_BAND_TOLERANCE +
      " | " + config.SOURCE_ADDRESS + " -> " + config.DESTINATION_ADDRESS + " | actuator " + config.ACTUATOR_ADDRESS
    );

    // Sink failures go straight to the console; the failed sink cannot carry them
    for (let i = 0; i < messages.length; i++) {
      if (!messages[i].success) {
        consoleApi.log('⚠️ [WARNING]  ' + messages[i].message);
      }
    }

    if (onReady) {
      onReady(runtime);
    }
  });

  return runtime;
}
