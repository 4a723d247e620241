/**
 * Pipeline type definitions
 */

import type { SensorFrame, SignalFrame } from '@codec/frame';
import type { ClassifierStats, FrameFlag } from '@core/classifier';
import type { IotUserConfig } from '$types';

/**
 * Settings the pipeline reads from CONFIG
 */
export type PipelineConfig = Pick<
  IotUserConfig,
  'SOURCE_ADDRESS' | 'ACTUATOR_ADDRESS' | 'TRAINING_WINDOW_SIZE' | 'MID_BAND_TOLERANCE'
>;

/**
 * Options for classifying a frame sequence
 */
export interface NetworkLayerOptions {
  /** Half-width of the mid band */
  tolerance: number;
  /** Source address of derived signal frames, defaults to each sensor frame's source */
  source?: string;
  /** Destination of derived signal frames */
  actuator?: string;
}

/**
 * One classified frame
 */
export interface ClassifiedFrame {
  frame: SensorFrame;
  flag: FrameFlag | null;
}

/**
 * Output of simulateNetworkLayer
 */
export interface NetworkLayerResult {
  /** Frames that matched a rule, in arrival order */
  essentials: SensorFrame[];
  /** Signal frames derived from essentials that map to a signal */
  signals: SignalFrame[];
  /** Flag for every input frame, in arrival order */
  classified: ClassifiedFrame[];
  /** Statistics after the last frame */
  stats: ClassifierStats;
}

/**
 * Output of runPipeline
 */
export interface PipelineResult {
  /** Every decoded frame */
  frames: SensorFrame[];
  essentials: SensorFrame[];
  signals: SignalFrame[];
  classified: ClassifiedFrame[];
  /** Statistics right after training */
  trained: ClassifierStats;
  /** Statistics after the whole stream */
  final: ClassifierStats;
}

/**
 * Header settings for encoding rows
 */
export interface EncodeOptions {
  source?: string;
  destination?: string;
}
