/**
 * Frame type definitions
 */

import type { Payload, SensorData, SignalData } from '@codec/payload';

/**
 * On-wire unit: header, one payload variant, MD5 checksum of the payload
 *
 * Layout:
 *   0   6  source address       ASCII
 *   6   6  destination address  ASCII
 *   12  4  sequence number      uint32 big-endian, 1-based
 *   16  n  payload              variant-specific, fixed per kind
 *   16+n 16 checksum            MD5 of the encoded payload only
 */
export interface Frame<P extends Payload = Payload> {
  readonly source: string;
  readonly destination: string;
  readonly sequence: number;
  readonly payload: P;
  /** Base64 MD5 of the encoded payload */
  readonly checksum: string;
}

export type SensorFrame = Frame<SensorData>;
export type SignalFrame = Frame<SignalData>;

/**
 * Header overrides for createFrame
 */
export interface FrameOptions {
  /** Source address (6 ASCII chars), defaults to the sensor node */
  source?: string;
  /** Destination address (6 ASCII chars), defaults to the network layer */
  destination?: string;
}
