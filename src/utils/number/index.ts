/**
 * Number utilities
 */

/** Largest value a 32-bit unsigned field can hold */
export const UINT32_MAX = 0xffffffff;

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 * - isFinite("5") = true (coerces to number)
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && isFinite(value);
}

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && isFinite(value) && Math.floor(value) === value;
}

/**
 * Check if a value fits a 32-bit unsigned integer field
 *
 * @param value - Value to check
 * @returns true if value is an integer in [0, 2^32 - 1]
 */
export function isUint32(value: unknown): value is number {
  return isInteger(value) && value >= 0 && value <= UINT32_MAX;
}
