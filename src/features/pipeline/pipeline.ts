/**
 * Pipeline driver
 *
 * Rows are encoded into sensor frames; a decoded frame stream is trained on
 * its leading window and then classified in full, training window
 * included, collecting essential frames and the signal frames they derive.
 */

import { createFrame } from '@codec/frame';
import type { SensorFrame, SignalFrame } from '@codec/frame';
import type { SensorData } from '@codec/payload';
import { classify, deriveSignalFrame, trainStats, validateTolerance } from '@core/classifier';
import type { ClassifierStats } from '@core/classifier';
import type { Logger } from '@logging';
import { collectFrames } from '@stream/reader';
import type { DecodeResult } from '$types/common';

import { formatEssential, formatStats } from './helpers';
import type {
  ClassifiedFrame,
  EncodeOptions,
  NetworkLayerOptions,
  NetworkLayerResult,
  PipelineConfig,
  PipelineResult
} from './types';

/**
 * Wrap readings in sensor frames numbered from 1
 *
 * @param readings - Sensor payloads in arrival order
 * @param options - Header addresses
 * @returns One frame per reading
 * @throws {AddressValidationError} If an address is invalid
 */
export function encodeRowsToFrames(readings: Iterable<SensorData>, options?: EncodeOptions): SensorFrame[] {
  const frames: SensorFrame[] = [];
  let sequence = 1;
  for (const reading of readings) {
    frames.push(createFrame(reading, sequence, options));
    sequence++;
  }
  return frames;
}

/**
 * Classify frames in order, collecting essentials and derived signals
 *
 * @param frames - Sensor frames in arrival order
 * @param stats - Statistics to start from
 * @param options - Tolerance and signal addressing
 * @param logger - Receives one DEBUG line per essential frame
 * @returns Essentials, signals, per-frame flags and the final statistics
 */
export function simulateNetworkLayer(
  frames: Iterable<SensorFrame>,
  stats: ClassifierStats,
  options: NetworkLayerOptions,
  logger?: Logger
): NetworkLayerResult {
  const essentials: SensorFrame[] = [];
  const signals: SignalFrame[] = [];
  const classified: ClassifiedFrame[] = [];
  let current = stats;

  for (const frame of frames) {
    const result = classify(current, frame, options.tolerance);
    current = result.stats;
    classified.push({ frame: frame, flag: result.flag });

    if (result.flag === null) {
      continue;
    }

    essentials.push(frame);
    if (logger) {
      logger.debug(formatEssential(frame, result.flag));
    }

    const signal = deriveSignalFrame(frame, result.flag, { source: options.source, actuator: options.actuator });
    if (signal !== null) {
      signals.push(signal);
    }
  }

  return { essentials: essentials, signals: signals, classified: classified, stats: current };
}

/**
 * Run classification over a decoded frame stream
 *
 * Every frame is decoded before any is classified; one bad frame aborts
 * the run.
 *
 * @param results - Decode results from readFrames or openFrameFile
 * @param config - Window size, tolerance and addresses
 * @param logger - Pipeline logger
 * @returns Frames, outputs and statistics
 * @throws {PipelineError} The first decode error, or EmptyTrainingWindow for an empty stream
 */
export function runPipeline(
  results: Iterable<DecodeResult<SensorFrame>>,
  config: PipelineConfig,
  logger: Logger
): PipelineResult {
  validateTolerance(config.MID_BAND_TOLERANCE);

  const collected = collectFrames(results);
  if (!collected.ok) {
    logger.critical("Frame stream rejected (" + collected.error.kind + "): " + collected.error.message);
    throw collected.error;
  }

  const frames = collected.value;
  if (frames.length > 0 && frames.length < config.TRAINING_WINDOW_SIZE) {
    logger.warning("Only " + frames.length + " frames, shorter than the " + config.TRAINING_WINDOW_SIZE + "-frame training window");
  }

  const window = frames.slice(0, config.TRAINING_WINDOW_SIZE);
  const trained = trainStats(window);
  logger.debug("Trained on " + window.length + " frames: " + formatStats(trained));

  const output = simulateNetworkLayer(frames, trained, {
    tolerance: config.MID_BAND_TOLERANCE,
    source: config.SOURCE_ADDRESS,
    actuator: config.ACTUATOR_ADDRESS,
  }, logger);

  logger.debug("Final statistics: " + formatStats(output.stats));
  logger.info(
    "Classified " + frames.length + " frames: " + output.essentials.length + " essential, " +
    output.signals.length + " signal"
  );

  return {
    frames: frames,
    essentials: output.essentials,
    signals: output.signals,
    classified: output.classified,
    trained: trained,
    final: output.stats,
  };
}
