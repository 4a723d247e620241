/**
 * Payload helper functions
 */

import { ReadingValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';
import { formatTimestamp, isEncodableTimestamp, parseTimestamp, TIMESTAMP_LENGTH } from '@utils/time';

import type { Signal } from './types';

/** Wire codes for each signal */
export const SIGNAL_CODES: Readonly<Record<Signal, number>> = {
  Off: 1,
  Low: 2,
  High: 3,
};

/**
 * Look up the signal for a wire code
 * @param code - Byte value from the wire
 * @returns Matching signal, or null for an unknown code
 */
export function signalFromCode(code: number): Signal | null {
  if (code === SIGNAL_CODES.Off) return 'Off';
  if (code === SIGNAL_CODES.Low) return 'Low';
  if (code === SIGNAL_CODES.High) return 'High';
  return null;
}

/**
 * Validate that a timestamp fits the 19-byte wire field
 * @throws {ReadingValidationError} If the date is invalid or outside years 1-9999
 */
export function validateTimestamp(timestamp: Date, context: string): void {
  if (!isEncodableTimestamp(timestamp)) {
    throw new ReadingValidationError(context + ': timestamp must be a valid date in years 1-9999, got ' + String(timestamp));
  }
}

/**
 * Validate a temperature or humidity value
 * @throws {ReadingValidationError} If value is not a finite number
 */
export function validateMeasurement(value: number, field: string): void {
  if (!isFiniteNumber(value)) {
    throw new ReadingValidationError(field + ' must be a finite number, got ' + value);
  }
}

/**
 * Write a timestamp as 19 ASCII bytes
 * @param target - Buffer to write into
 * @param timestamp - Epoch milliseconds
 * @param offset - Byte offset of the field
 */
export function writeTimestamp(target: Buffer, timestamp: number, offset: number): void {
  target.write(formatTimestamp(new Date(timestamp)), offset, TIMESTAMP_LENGTH, 'latin1');
}

/**
 * Read a 19-byte ASCII timestamp
 * @param source - Buffer holding the field
 * @param offset - Byte offset of the field
 * @returns Epoch milliseconds, or null if the field is not a valid timestamp
 */
export function readTimestamp(source: Buffer, offset: number): number | null {
  const date = parseTimestamp(source.toString('latin1', offset, offset + TIMESTAMP_LENGTH));
  return date === null ? null : date.getTime();
}
