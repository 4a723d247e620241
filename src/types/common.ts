/**
 * Common type definitions used throughout the project
 */

import type { PipelineError } from './errors';

/**
 * Outcome of a decode step
 * Decoders return errors as values; the stream reader ends on the first one.
 */
export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: PipelineError };
