/**
 * Payload type definitions
 *
 * A payload is a closed tagged union. Each variant has a fixed encoded
 * size, so a frame's byte length is known from its payload kind alone.
 */

/**
 * Control signal sent to the actuator (irrigation switch)
 */
export type Signal = 'Off' | 'Low' | 'High';

/**
 * Sensor reading payload
 * Encodes to 35 bytes: timestamp (19 ASCII), temperature (f64 BE), humidity (f64 BE)
 */
export interface SensorData {
  readonly kind: 'sensor';
  /** Reading time as UTC-field epoch milliseconds, whole seconds */
  readonly timestamp: number;
  /** Temperature in °C */
  readonly temperature: number;
  /** Relative humidity in % */
  readonly humidity: number;
}

/**
 * Control signal payload
 * Encodes to 20 bytes: timestamp (19 ASCII), signal code (u8)
 */
export interface SignalData {
  readonly kind: 'signal';
  /** Timestamp of the sensor reading the signal was derived from, epoch milliseconds */
  readonly timestamp: number;
  readonly signal: Signal;
}

export type Payload = SensorData | SignalData;

export type PayloadKind = Payload['kind'];

/** Payload variant for a given kind tag */
export type PayloadOf<K extends PayloadKind> = Extract<Payload, { kind: K }>;
