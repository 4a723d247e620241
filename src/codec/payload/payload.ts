/**
 * Payload codec
 *
 * Fixed-size binary encode/decode for each payload variant.
 *
 * Sensor layout (35 bytes):
 *   0  19  timestamp    ASCII "YYYY-MM-DD HH:MM:SS"
 *   19  8  temperature  IEEE-754 double, big-endian
 *   27  8  humidity     IEEE-754 double, big-endian
 *
 * Signal layout (20 bytes):
 *   0  19  timestamp    ASCII "YYYY-MM-DD HH:MM:SS"
 *   19  1  signal code  Off=1, Low=2, High=3
 */

import type { DecodeResult } from '$types/common';
import { MalformedPayloadError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';
import { err, ok } from '@utils/result';
import { formatTimestamp, TIMESTAMP_LENGTH, truncateToSecond } from '@utils/time';

import {
  readTimestamp,
  signalFromCode,
  SIGNAL_CODES,
  validateMeasurement,
  validateTimestamp,
  writeTimestamp
} from './helpers';
import type { Payload, PayloadKind, PayloadOf, SensorData, Signal, SignalData } from './types';

const FLOAT64_LENGTH = 8;
const TEMPERATURE_OFFSET = TIMESTAMP_LENGTH;
const HUMIDITY_OFFSET = TEMPERATURE_OFFSET + FLOAT64_LENGTH;
const SIGNAL_CODE_OFFSET = TIMESTAMP_LENGTH;

/** Encoded byte length of each payload variant */
export const PAYLOAD_SIZES: Readonly<Record<PayloadKind, number>> = {
  sensor: HUMIDITY_OFFSET + FLOAT64_LENGTH,
  signal: SIGNAL_CODE_OFFSET + 1,
};

/**
 * Per-variant codec
 */
export interface PayloadCodec<P extends Payload> {
  size: number;
  encode(payload: P): Buffer;
  decode(bytes: Buffer): DecodeResult<P>;
}

// ═══════════════════════════════════════════════════════════════
// CONSTRUCTORS
// ═══════════════════════════════════════════════════════════════

/**
 * Create a sensor reading payload
 *
 * @param timestamp - Reading time (sub-second part is dropped)
 * @param temperature - Temperature in °C
 * @param humidity - Relative humidity in %
 * @returns Immutable sensor payload
 * @throws {ReadingValidationError} If any field cannot be encoded
 */
export function createSensorData(timestamp: Date, temperature: number, humidity: number): SensorData {
  validateTimestamp(timestamp, 'createSensorData');
  validateMeasurement(temperature, 'temperature');
  validateMeasurement(humidity, 'humidity');

  const data: SensorData = {
    kind: 'sensor',
    timestamp: truncateToSecond(timestamp).getTime(),
    temperature: temperature,
    humidity: humidity,
  };
  return Object.freeze(data);
}

/**
 * Create a control signal payload
 *
 * @param timestamp - Timestamp of the originating reading
 * @param signal - Signal to send
 * @returns Immutable signal payload
 * @throws {ReadingValidationError} If the timestamp cannot be encoded
 */
export function createSignalData(timestamp: Date, signal: Signal): SignalData {
  validateTimestamp(timestamp, 'createSignalData');

  const data: SignalData = {
    kind: 'signal',
    timestamp: truncateToSecond(timestamp).getTime(),
    signal: signal,
  };
  return Object.freeze(data);
}

// ═══════════════════════════════════════════════════════════════
// SENSOR CODEC
// ═══════════════════════════════════════════════════════════════

/**
 * Encode a sensor payload to 35 bytes
 */
export function encodeSensorData(data: SensorData): Buffer {
  const bytes = Buffer.alloc(PAYLOAD_SIZES.sensor);
  writeTimestamp(bytes, data.timestamp, 0);
  bytes.writeDoubleBE(data.temperature, TEMPERATURE_OFFSET);
  bytes.writeDoubleBE(data.humidity, HUMIDITY_OFFSET);
  return bytes;
}

/**
 * Decode a sensor payload
 *
 * @param bytes - At least 35 bytes; anything past byte 35 is ignored
 * @returns Decoded payload, or MalformedPayload for a bad timestamp or a
 *   non-finite reading
 */
export function decodeSensorData(bytes: Buffer): DecodeResult<SensorData> {
  if (bytes.length < PAYLOAD_SIZES.sensor) {
    return err(new MalformedPayloadError(
      'sensor payload needs ' + PAYLOAD_SIZES.sensor + ' bytes, got ' + bytes.length
    ));
  }

  const timestamp = readTimestamp(bytes, 0);
  if (timestamp === null) {
    return err(new MalformedPayloadError(
      'unparseable timestamp "' + bytes.toString('latin1', 0, TIMESTAMP_LENGTH) + '"'
    ));
  }

  const temperature = bytes.readDoubleBE(TEMPERATURE_OFFSET);
  if (!isFiniteNumber(temperature)) {
    return err(new MalformedPayloadError('temperature is not a finite number: ' + temperature));
  }
  const humidity = bytes.readDoubleBE(HUMIDITY_OFFSET);
  if (!isFiniteNumber(humidity)) {
    return err(new MalformedPayloadError('humidity is not a finite number: ' + humidity));
  }

  const data: SensorData = {
    kind: 'sensor',
    timestamp: timestamp,
    temperature: temperature,
    humidity: humidity,
  };
  return ok(Object.freeze(data));
}

// ═══════════════════════════════════════════════════════════════
// SIGNAL CODEC
// ═══════════════════════════════════════════════════════════════

/**
 * Encode a signal payload to 20 bytes
 */
export function encodeSignalData(data: SignalData): Buffer {
  const bytes = Buffer.alloc(PAYLOAD_SIZES.signal);
  writeTimestamp(bytes, data.timestamp, 0);
  bytes.writeUInt8(SIGNAL_CODES[data.signal], SIGNAL_CODE_OFFSET);
  return bytes;
}

/**
 * Decode a signal payload
 *
 * @param bytes - At least 20 bytes; anything past byte 20 is ignored
 * @returns Decoded payload, or MalformedPayload
 */
export function decodeSignalData(bytes: Buffer): DecodeResult<SignalData> {
  if (bytes.length < PAYLOAD_SIZES.signal) {
    return err(new MalformedPayloadError(
      'signal payload needs ' + PAYLOAD_SIZES.signal + ' bytes, got ' + bytes.length
    ));
  }

  const timestamp = readTimestamp(bytes, 0);
  if (timestamp === null) {
    return err(new MalformedPayloadError(
      'unparseable timestamp "' + bytes.toString('latin1', 0, TIMESTAMP_LENGTH) + '"'
    ));
  }

  const code = bytes.readUInt8(SIGNAL_CODE_OFFSET);
  const signal = signalFromCode(code);
  if (signal === null) {
    return err(new MalformedPayloadError('unknown signal code ' + code));
  }

  const data: SignalData = {
    kind: 'signal',
    timestamp: timestamp,
    signal: signal,
  };
  return ok(Object.freeze(data));
}

// ═══════════════════════════════════════════════════════════════
// TAGGED DISPATCH
// ═══════════════════════════════════════════════════════════════

/** Codec for each payload kind */
export const PAYLOAD_CODECS: { readonly [K in PayloadKind]: PayloadCodec<PayloadOf<K>> } = {
  sensor: { size: PAYLOAD_SIZES.sensor, encode: encodeSensorData, decode: decodeSensorData },
  signal: { size: PAYLOAD_SIZES.signal, encode: encodeSignalData, decode: decodeSignalData },
};

/**
 * Encode any payload with the codec selected by its tag
 */
export function encodePayload(payload: Payload): Buffer {
  switch (payload.kind) {
    case 'sensor':
      return encodeSensorData(payload);
    case 'signal':
      return encodeSignalData(payload);
  }
}

/**
 * Decode a payload of a known kind
 */
export function decodePayload<K extends PayloadKind>(kind: K, bytes: Buffer): DecodeResult<PayloadOf<K>> {
  return PAYLOAD_CODECS[kind].decode(bytes);
}

/**
 * Render a payload the way frame listings show it
 * @returns "2023-01-01 00:00:00, 18.00, 40.00" or "2023-01-01 00:00:00, High"
 */
export function describePayload(payload: Payload): string {
  const stamp = formatTimestamp(new Date(payload.timestamp));
  if (payload.kind === 'sensor') {
    return stamp + ', ' + payload.temperature.toFixed(2) + ', ' + payload.humidity.toFixed(2);
  }
  return stamp + ', ' + payload.signal;
}
