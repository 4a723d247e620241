/**
 * Flag to actuator signal mapping
 */

import { DEFAULT_ACTUATOR_ADDRESS, createFrame } from '@codec/frame';
import { createSignalData } from '@codec/payload';
import type { Signal } from '@codec/payload';

import type { FrameFlag, SensorFrame, SignalFrame, SignalFrameOptions } from './types';

const SIGNAL_FOR_FLAG: Readonly<Record<FrameFlag, Signal | null>> = {
  HTHH: 'Low',
  LTLH: 'High',
  HTLH: 'High',
  LTHH: null,
  HTMH: 'Low',
  LTMH: 'Low',
  MTLH: 'High',
  MTHH: null,
  MTMH: null,
};

/**
 * Signal to send for a flag
 * @returns Low or High, or null for flags that do not drive the actuator
 */
export function toggle(flag: FrameFlag): Signal | null {
  return SIGNAL_FOR_FLAG[flag];
}

/**
 * Build the signal frame for an essential sensor frame
 *
 * The signal frame reuses the sensor frame's sequence number and timestamp
 * and is addressed to the actuator.
 *
 * @param frame - Classified sensor frame
 * @param flag - Its flag
 * @param options - Address overrides
 * @returns Signal frame, or null when the flag maps to no signal
 */
export function deriveSignalFrame(
  frame: SensorFrame,
  flag: FrameFlag,
  options?: SignalFrameOptions
): SignalFrame | null {
  const signal = toggle(flag);
  if (signal === null) {
    return null;
  }

  return createFrame(createSignalData(new Date(frame.payload.timestamp), signal), frame.sequence, {
    source: options?.source ?? frame.source,
    destination: options?.actuator ?? DEFAULT_ACTUATOR_ADDRESS,
  });
}
