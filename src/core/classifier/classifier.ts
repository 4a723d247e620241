/**
 * Self-adjusting threshold classifier
 *
 * Each frame is judged against the statistics as they stood before it
 * arrived, then folded into them. Mid marks move halfway toward every new
 * reading, so the outcome depends on frame order.
 */

import type { SensorFrame } from '@codec/frame';

import { CLASSIFICATION_RULES, DEFAULT_TOLERANCE, inBand, statsFromWindow } from './helpers';
import type { Classification, ClassifierStats, FrameFlag, Reading } from './types';

/**
 * Train initial statistics on a window of sensor frames
 *
 * @param frames - Training window, must not be empty
 * @returns lt/ht and lh/hh as min/max, mt and mh as their midpoints
 * @throws {EmptyTrainingWindowError} If frames is empty
 *
 * @example
 * ```typescript
 * const stats = trainStats(frames.slice(0, 24));
 * ```
 */
export function trainStats(frames: readonly SensorFrame[]): ClassifierStats {
  const temperatures: number[] = [];
  const humidities: number[] = [];
  for (const frame of frames) {
    temperatures.push(frame.payload.temperature);
    humidities.push(frame.payload.humidity);
  }
  return statsFromWindow(temperatures, humidities);
}

/**
 * Match a reading against the classification table
 * @param stats - Current statistics
 * @param reading - Temperature and humidity
 * @param tolerance - Half-width of the mid band
 * @returns First matching flag, or null when the reading is non-essential
 */
export function classifyReading(
  stats: ClassifierStats,
  reading: Reading,
  tolerance: number = DEFAULT_TOLERANCE
): FrameFlag | null {
  for (const rule of CLASSIFICATION_RULES) {
    if (inBand(reading.temperature, rule.temperature, stats.lt, stats.ht, stats.mt, tolerance) &&
        inBand(reading.humidity, rule.humidity, stats.lh, stats.hh, stats.mh, tolerance)) {
      return rule.flag;
    }
  }
  return null;
}

/**
 * Fold a reading into the statistics
 * @returns New statistics; the input is not modified
 */
export function updateStats(stats: ClassifierStats, reading: Reading): ClassifierStats {
  return {
    lt: Math.min(stats.lt, reading.temperature),
    ht: Math.max(stats.ht, reading.temperature),
    mt: (stats.mt + reading.temperature) / 2,
    lh: Math.min(stats.lh, reading.humidity),
    hh: Math.max(stats.hh, reading.humidity),
    mh: (stats.mh + reading.humidity) / 2,
  };
}

/**
 * Classify one frame, then update the statistics with it
 * @param stats - Statistics before this frame
 * @param frame - Sensor frame
 * @param tolerance - Half-width of the mid band
 * @returns Flag decided on the old statistics and the updated statistics
 */
export function classify(
  stats: ClassifierStats,
  frame: SensorFrame,
  tolerance: number = DEFAULT_TOLERANCE
): Classification {
  const flag = classifyReading(stats, frame.payload, tolerance);
  return { flag: flag, stats: updateStats(stats, frame.payload) };
}
