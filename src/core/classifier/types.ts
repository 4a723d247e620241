/**
 * Classifier type definitions
 */

import type { SensorFrame, SignalFrame } from '@codec/frame';

/**
 * Outcome of a classification: temperature band then humidity band
 * (H = at or above the high mark, L = at or below the low mark, M = within
 * tolerance of the mid mark)
 */
export type FrameFlag =
  | 'HTHH'
  | 'LTLH'
  | 'HTLH'
  | 'LTHH'
  | 'HTMH'
  | 'LTMH'
  | 'MTLH'
  | 'MTHH'
  | 'MTMH';

/**
 * Band a single measurement must fall into for a rule to match
 */
export type Band = 'high' | 'low' | 'mid';

/**
 * One row of the classification table
 */
export interface ClassificationRule {
  flag: FrameFlag;
  temperature: Band;
  humidity: Band;
}

/**
 * Running statistics the classifier adapts after every frame
 */
export interface ClassifierStats {
  /** Lowest temperature seen */
  readonly lt: number;
  /** Highest temperature seen */
  readonly ht: number;
  /** Mid temperature, smoothed toward each new reading */
  readonly mt: number;
  /** Lowest humidity seen */
  readonly lh: number;
  /** Highest humidity seen */
  readonly hh: number;
  /** Mid humidity, smoothed toward each new reading */
  readonly mh: number;
}

/**
 * Measurements the rules look at
 */
export interface Reading {
  temperature: number;
  humidity: number;
}

/**
 * Result of classifying one frame
 */
export interface Classification {
  /** Flag from the pre-update statistics, null when no rule matched */
  flag: FrameFlag | null;
  /** Statistics after folding in the frame */
  stats: ClassifierStats;
}

/**
 * Header overrides for derived signal frames
 */
export interface SignalFrameOptions {
  /** Source address, defaults to the sensor node */
  source?: string;
  /** Actuator address, defaults to 025C8H */
  actuator?: string;
}

export type { SensorFrame, SignalFrame };
