/**
 * Decode result constructors
 */

import type { DecodeResult } from '$types/common';
import type { PipelineError } from '$types/errors';

/**
 * Wrap a successfully decoded value
 * @param value - Decoded value
 * @returns Success result
 */
export function ok<T>(value: T): DecodeResult<T> {
  return { ok: true, value: value };
}

/**
 * Wrap a decode failure
 * @param error - Failure cause
 * @returns Failure result
 */
export function err<T>(error: PipelineError): DecodeResult<T> {
  return { ok: false, error: error };
}
