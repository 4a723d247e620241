/**
 * Run report
 *
 * Counts, printable frame listings and chart series for a pipeline run.
 */

import type { Frame } from '@codec/frame';
import { describePayload } from '@codec/payload';
import type { PipelineResult } from '@features/pipeline';
import { formatDate, formatTime } from '@utils/time';

import type { PlotPoint, PlotSeries, PlotValue, RunSummary } from './types';

/**
 * Count frames, essentials and signals
 * @param result - Pipeline output
 * @returns Counts and the essential share in percent
 */
export function summarizeRun(result: PipelineResult): RunSummary {
  const total = result.frames.length;
  const essential = result.essentials.length;
  return {
    total: total,
    essential: essential,
    signal: result.signals.length,
    essentialPercentage: total === 0 ? 0 : essential * 100 / total,
  };
}

/**
 * Render the two count lines printed at the end of a run
 * @returns ["Essential Frame Count: N", "   Signal Frame Count: M"]
 */
export function formatSummary(summary: RunSummary): string[] {
  return [
    'Essential Frame Count: ' + summary.essential,
    '   Signal Frame Count: ' + summary.signal,
  ];
}

/**
 * Multi-line description of a frame
 *
 * @example
 * ```
 * Frame: 25
 *   source      : 013A5B
 *   destination : 014D8E
 *   data        : 2023-01-02 00:00:00, 30.00, 80.00
 *   checksum    : <base64 MD5 of the payload>
 * ```
 */
export function describeFrame(frame: Frame): string {
  return [
    'Frame: ' + frame.sequence,
    '  source      : ' + frame.source,
    '  destination : ' + frame.destination,
    '  data        : ' + describePayload(frame.payload),
    '  checksum    : ' + frame.checksum,
  ].join('\n');
}

/**
 * Describe a list of frames, each headed by "<label>: <position>"
 * @param frames - Frames to list
 * @param label - Heading, e.g. "Essential Frame"
 * @returns One block per frame, 1-based positions
 */
export function describeFrames(frames: readonly Frame[], label: string): string {
  const blocks: string[] = [];
  for (let i = 0; i < frames.length; i++) {
    blocks.push(label + ': ' + (i + 1) + '\n' + describeFrame(frames[i]));
  }
  return blocks.join('\n');
}

function toPoint(frame: Frame, value: PlotValue): PlotPoint {
  return {
    date: formatDate(new Date(frame.payload.timestamp)),
    time: formatTime(new Date(frame.payload.timestamp)),
    value: value,
  };
}

/**
 * Build chart series: every sensor frame, the essential ones, and signals
 * @param result - Pipeline output
 * @returns Points keyed by date and time of day
 */
export function buildPlotSeries(result: PipelineResult): PlotSeries {
  return {
    percentage: summarizeRun(result).essentialPercentage,
    sensors: result.frames.map(function(frame) {
      return toPoint(frame, 'sensor');
    }),
    essentials: result.essentials.map(function(frame) {
      return toPoint(frame, 'essential');
    }),
    signals: result.signals.map(function(frame) {
      return toPoint(frame, frame.payload.signal);
    }),
  };
}
