/**
 * Classifier helper functions
 */

import { EmptyTrainingWindowError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { Band, ClassificationRule, ClassifierStats } from './types';

/** Distance from a mid mark that still counts as mid */
export const DEFAULT_TOLERANCE = 1.5;

/**
 * Classification table in priority order; the first matching row wins
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { flag: 'HTHH', temperature: 'high', humidity: 'high' },
  { flag: 'LTLH', temperature: 'low', humidity: 'low' },
  { flag: 'HTLH', temperature: 'high', humidity: 'low' },
  { flag: 'LTHH', temperature: 'low', humidity: 'high' },
  { flag: 'HTMH', temperature: 'high', humidity: 'mid' },
  { flag: 'LTMH', temperature: 'low', humidity: 'mid' },
  { flag: 'MTLH', temperature: 'mid', humidity: 'low' },
  { flag: 'MTHH', temperature: 'mid', humidity: 'high' },
  { flag: 'MTMH', temperature: 'mid', humidity: 'mid' },
];

/**
 * Check whether a value falls in a band (all bounds inclusive)
 * @param value - Measurement
 * @param band - Band to test
 * @param low - Low mark
 * @param high - High mark
 * @param mid - Mid mark
 * @param tolerance - Half-width of the mid band
 */
export function inBand(
  value: number,
  band: Band,
  low: number,
  high: number,
  mid: number,
  tolerance: number
): boolean {
  if (band === 'high') return value >= high;
  if (band === 'low') return value <= low;
  return Math.abs(value - mid) <= tolerance;
}

/**
 * Validate mid-band tolerance
 * @throws {Error} If tolerance is not a positive finite number
 */
export function validateTolerance(tolerance: number): void {
  if (!isFiniteNumber(tolerance) || tolerance <= 0) {
    throw new Error('tolerance must be a positive finite number, got ' + tolerance);
  }
}

/**
 * Compute initial statistics from a window of readings
 * @param temperatures - Window temperatures
 * @param humidities - Window humidities
 * @throws {EmptyTrainingWindowError} If the window is empty
 */
export function statsFromWindow(temperatures: number[], humidities: number[]): ClassifierStats {
  if (temperatures.length === 0 || humidities.length === 0) {
    throw new EmptyTrainingWindowError('cannot train on an empty window');
  }

  let lt = temperatures[0];
  let ht = temperatures[0];
  for (const t of temperatures) {
    if (t < lt) {
      lt = t;
    }
    if (t > ht) {
      ht = t;
    }
  }

  let lh = humidities[0];
  let hh = humidities[0];
  for (const h of humidities) {
    if (h < lh) {
      lh = h;
    }
    if (h > hh) {
      hh = h;
    }
  }

  return {
    lt: lt,
    ht: ht,
    mt: (lt + ht) / 2,
    lh: lh,
    hh: hh,
    mh: (lh + hh) / 2,
  };
}
