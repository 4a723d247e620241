/**
 * Frame helper functions
 */

import { createHash } from 'crypto';

import { AddressValidationError } from '$types/errors';

/** Length of an address field in bytes */
export const ADDRESS_LENGTH = 6;
/** Length of the sequence number field in bytes */
export const SEQUENCE_LENGTH = 4;
/** Length of an MD5 digest in bytes */
export const CHECKSUM_LENGTH = 16;
/** Source + destination + sequence */
export const HEADER_SIZE = ADDRESS_LENGTH * 2 + SEQUENCE_LENGTH;

export const DEFAULT_SOURCE_ADDRESS = '013A5B';
export const DEFAULT_DESTINATION_ADDRESS = '014D8E';
/** Address of the irrigation switch that receives signal frames */
export const DEFAULT_ACTUATOR_ADDRESS = '025C8H';

const ADDRESS_PATTERN = /^[\x20-\x7e]{6}$/;

/**
 * Calculate the MD5 digest of encoded payload bytes
 *
 * Integrity check only; MD5 is not used as a security control here.
 *
 * @param data - Encoded payload
 * @returns 16-byte digest
 */
export function calculateChecksum(data: Buffer): Buffer {
  return createHash('md5').update(data).digest();
}

/**
 * Render a checksum as base64 for listings
 */
export function checksumToString(checksum: Buffer): string {
  return checksum.toString('base64');
}

/**
 * Validate a frame address
 * @throws {AddressValidationError} If address is not exactly 6 printable ASCII characters
 */
export function validateAddress(address: string, field: string): void {
  if (!ADDRESS_PATTERN.test(address)) {
    throw new AddressValidationError(
      field + ' address must be ' + ADDRESS_LENGTH + ' printable ASCII characters, got "' + address + '"'
    );
  }
}

/**
 * Check whether a string can be used as a frame address
 */
export function isValidAddress(address: string): boolean {
  return ADDRESS_PATTERN.test(address);
}
