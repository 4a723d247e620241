/**
 * CLI command handlers
 *
 * Each handler takes a validated runtime and works on the files named in
 * its configuration. Printing is left to the caller through `out`.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';

import { encodeRowsToFrames, runPipeline } from '@features/pipeline';
import type { PipelineResult } from '@features/pipeline';
import { buildPlotSeries, describeFrames, formatSummary, summarizeRun } from '@features/report';
import { readSensorRowFile } from '@features/rows';
import { openFrameFile, writeFrameFile } from '@stream/reader';
import type { IotConfig } from '$types';

import { parseLogLevel } from './env';
import type { CliOptions, Runtime } from './types';

/**
 * Apply command line options over a configuration
 *
 * @param config - Configuration after environment overrides
 * @param options - Parsed CLI options
 * @returns New configuration
 * @throws {ValidationError} If --log-level names no level
 */
export function applyCliOverrides(config: IotConfig, options: CliOptions): IotConfig {
  const level = options.logLevel !== undefined ? parseLogLevel(options.logLevel, '--log-level') : null;

  return {
    ...config,
    INPUT_ROWS_PATH: options.input ?? config.INPUT_ROWS_PATH,
    FRAME_FILE_PATH: options.frames ?? config.FRAME_FILE_PATH,
    TRAINING_WINDOW_SIZE: options.window ?? config.TRAINING_WINDOW_SIZE,
    MID_BAND_TOLERANCE: options.tolerance ?? config.MID_BAND_TOLERANCE,
    GLOBAL_LOG_LEVEL: level ?? config.GLOBAL_LOG_LEVEL,
    CONSOLE_LOG_LEVEL: level ?? config.CONSOLE_LOG_LEVEL,
    CONSOLE_COLORS: options.color === false ? false : config.CONSOLE_COLORS,
    FILE_LOG_ENABLED: options.logFile !== undefined ? true : config.FILE_LOG_ENABLED,
    FILE_LOG_PATH: options.logFile ?? config.FILE_LOG_PATH,
  };
}

/**
 * Encode the input rows into the frame file
 *
 * @param runtime - Validated configuration and logger
 * @returns Number of frames written
 * @throws {RowParseError} If a row cannot be parsed
 */
export function encodeCommand(runtime: Runtime): number {
  const config = runtime.config;
  const readings = readSensorRowFile(config.INPUT_ROWS_PATH);
  const frames = encodeRowsToFrames(readings, {
    source: config.SOURCE_ADDRESS,
    destination: config.DESTINATION_ADDRESS,
  });

  const count = writeFrameFile(config.FRAME_FILE_PATH, frames);
  runtime.logger.info("Encoded " + count + " rows from " + config.INPUT_ROWS_PATH + " into " + config.FRAME_FILE_PATH);
  return count;
}

/**
 * Classify the frame file
 *
 * @param runtime - Validated configuration and logger
 * @returns Pipeline result
 * @throws {PipelineError} If the frame file is corrupt or empty
 */
export function classifyCommand(runtime: Runtime): PipelineResult {
  return runPipeline(openFrameFile('sensor', runtime.config.FRAME_FILE_PATH), runtime.config, runtime.logger);
}

/**
 * Print the outcome of a classification
 *
 * Always prints the two count lines. With `list`, the essential and signal
 * frames follow; with `plot`, the plot series is written as JSON.
 *
 * @param result - Pipeline result
 * @param options - list and plot options
 * @param out - Line printer
 */
export function reportCommand(
  result: PipelineResult,
  options: Pick<CliOptions, 'list' | 'plot'>,
  out: (line: string) => void
): void {
  const lines = formatSummary(summarizeRun(result));
  for (let i = 0; i < lines.length; i++) {
    out(lines[i]);
  }

  if (options.list) {
    if (result.essentials.length > 0) {
      out(describeFrames(result.essentials, 'Essential Frame'));
    }
    if (result.signals.length > 0) {
      out(describeFrames(result.signals, 'Signal Frame'));
    }
  }

  if (options.plot !== undefined) {
    mkdirSync(dirname(options.plot), { recursive: true });
    writeFileSync(options.plot, JSON.stringify(buildPlotSeries(result), null, 2) + '\n', 'utf8');
    out('Plot series written to ' + options.plot);
  }
}
