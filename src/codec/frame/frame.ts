/**
 * Frame codec
 *
 * Wraps a payload with source/destination addresses, a sequence number and
 * an MD5 checksum of the encoded payload. The checksum never covers the
 * header.
 */

import {
  PAYLOAD_SIZES,
  decodePayload,
  encodePayload
} from '@codec/payload';
import type { Payload, PayloadKind, PayloadOf } from '@codec/payload';
import type { DecodeResult } from '$types/common';
import { InvalidFrameError, MalformedPayloadError, SequenceOverflowError } from '$types/errors';
import { isUint32 } from '@utils/number';
import { err, ok } from '@utils/result';

import {
  ADDRESS_LENGTH,
  CHECKSUM_LENGTH,
  DEFAULT_DESTINATION_ADDRESS,
  DEFAULT_SOURCE_ADDRESS,
  HEADER_SIZE,
  calculateChecksum,
  checksumToString,
  validateAddress
} from './helpers';
import type { Frame, FrameOptions } from './types';

/** Total on-wire size of a frame for each payload kind */
export const FRAME_SIZES: Readonly<Record<PayloadKind, number>> = {
  sensor: HEADER_SIZE + PAYLOAD_SIZES.sensor + CHECKSUM_LENGTH,
  signal: HEADER_SIZE + PAYLOAD_SIZES.signal + CHECKSUM_LENGTH,
};

const SEQUENCE_OFFSET = ADDRESS_LENGTH * 2;

/**
 * Fixed frame size for a payload kind
 * @returns 67 for sensor frames, 52 for signal frames
 */
export function frameSize(kind: PayloadKind): number {
  return FRAME_SIZES[kind];
}

/**
 * Build a frame around a payload, computing its checksum
 *
 * @param payload - Payload to carry
 * @param sequence - 1-based sequence number
 * @param options - Address overrides
 * @returns Immutable frame
 * @throws {AddressValidationError} If an address is not 6 printable ASCII characters
 *
 * @example
 * ```typescript
 * const frame = createFrame(createSensorData(ts, 24.5, 61.0), 1);
 * encodeFrame(frame).length; // 67
 * ```
 */
export function createFrame<P extends Payload>(payload: P, sequence: number, options?: FrameOptions): Frame<P> {
  const source = options?.source ?? DEFAULT_SOURCE_ADDRESS;
  const destination = options?.destination ?? DEFAULT_DESTINATION_ADDRESS;
  validateAddress(source, 'source');
  validateAddress(destination, 'destination');

  const frame: Frame<P> = {
    source: source,
    destination: destination,
    sequence: sequence,
    payload: payload,
    checksum: checksumToString(calculateChecksum(encodePayload(payload))),
  };
  return Object.freeze(frame);
}

/**
 * Encode a frame to its on-wire bytes
 *
 * @param frame - Frame to encode
 * @returns source | destination | sequence (u32 BE) | payload | checksum
 * @throws {SequenceOverflowError} If the sequence number does not fit 32 unsigned bits
 */
export function encodeFrame(frame: Frame): Buffer {
  if (!isUint32(frame.sequence)) {
    throw new SequenceOverflowError('sequence number ' + frame.sequence + ' does not fit in 32 unsigned bits');
  }

  const payload = encodePayload(frame.payload);
  const bytes = Buffer.alloc(HEADER_SIZE + payload.length + CHECKSUM_LENGTH);

  bytes.write(frame.source, 0, ADDRESS_LENGTH, 'latin1');
  bytes.write(frame.destination, ADDRESS_LENGTH, ADDRESS_LENGTH, 'latin1');
  bytes.writeUInt32BE(frame.sequence, SEQUENCE_OFFSET);
  payload.copy(bytes, HEADER_SIZE);
  Buffer.from(frame.checksum, 'base64').copy(bytes, HEADER_SIZE + payload.length, 0, CHECKSUM_LENGTH);

  return bytes;
}

/**
 * Decode exactly one frame
 *
 * The checksum is recomputed over the decoded payload's re-encoded bytes
 * and compared with the trailing 16 bytes. A payload that does not decode
 * is reported as InvalidFrame when its raw bytes also fail the checksum,
 * so every bit flip in the payload region surfaces as corruption.
 *
 * @param kind - Payload kind the frame carries
 * @param bytes - Exactly one frame's worth of bytes
 * @returns Decoded frame, MalformedPayload, or InvalidFrame on checksum mismatch
 */
export function decodeFrame<K extends PayloadKind>(kind: K, bytes: Buffer): DecodeResult<Frame<PayloadOf<K>>> {
  const size = FRAME_SIZES[kind];
  if (bytes.length !== size) {
    return err(new MalformedPayloadError(kind + ' frame needs exactly ' + size + ' bytes, got ' + bytes.length));
  }

  const sequence = bytes.readUInt32BE(SEQUENCE_OFFSET);
  const payloadEnd = HEADER_SIZE + PAYLOAD_SIZES[kind];

  const payloadBytes = bytes.subarray(HEADER_SIZE, payloadEnd);
  const checksum = bytes.subarray(payloadEnd, payloadEnd + CHECKSUM_LENGTH);

  const decoded = decodePayload(kind, payloadBytes);
  if (!decoded.ok) {
    // Undecodable and failing its checksum: corrupted after it was sent
    if (!calculateChecksum(payloadBytes).equals(checksum)) {
      return err(new InvalidFrameError(sequence, 'checksum mismatch in frame ' + sequence));
    }
    return err(decoded.error);
  }

  const expected = calculateChecksum(encodePayload(decoded.value));
  if (!expected.equals(checksum)) {
    return err(new InvalidFrameError(sequence, 'checksum mismatch in frame ' + sequence));
  }

  const frame: Frame<PayloadOf<K>> = {
    source: bytes.toString('latin1', 0, ADDRESS_LENGTH),
    destination: bytes.toString('latin1', ADDRESS_LENGTH, SEQUENCE_OFFSET),
    sequence: sequence,
    payload: decoded.value,
    checksum: checksumToString(checksum),
  };
  Object.freeze(frame);
  return ok(frame);
}
