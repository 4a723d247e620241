/**
 * Pipeline helper functions
 */

import type { SensorFrame } from '@codec/frame';
import type { ClassifierStats, FrameFlag } from '@core/classifier';
import { formatTimestamp } from '@utils/time';

/**
 * Format classifier statistics for logging
 * @returns e.g. "T 18.00/24.00/30.00 H 40.00/60.00/80.00" (low/mid/high)
 */
export function formatStats(stats: ClassifierStats): string {
  return "T " + stats.lt.toFixed(2) + "/" + stats.mt.toFixed(2) + "/" + stats.ht.toFixed(2) +
    " H " + stats.lh.toFixed(2) + "/" + stats.mh.toFixed(2) + "/" + stats.hh.toFixed(2);
}

/**
 * Format an essential frame for logging
 * @returns e.g. "#25 2023-06-02 01:00:00 30.00C 80.00% HTHH"
 */
export function formatEssential(frame: SensorFrame, flag: FrameFlag): string {
  return "#" + frame.sequence + " " + formatTimestamp(new Date(frame.payload.timestamp)) + " " +
    frame.payload.temperature.toFixed(2) + "C " + frame.payload.humidity.toFixed(2) + "% " + flag;
}
