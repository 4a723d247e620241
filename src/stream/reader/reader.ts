/**
 * Frame stream reader
 *
 * Splits a concatenation of fixed-size frames into decode results. Frames
 * carry no length prefix, so the caller names the payload kind and every
 * record is FRAME_SIZES[kind] bytes. Iteration stops after the first
 * failure; later bytes are never inspected.
 */

import { closeSync, mkdirSync, openSync, readSync, writeSync } from 'fs';
import { dirname } from 'path';

import { FRAME_SIZES, decodeFrame, encodeFrame } from '@codec/frame';
import type { Frame } from '@codec/frame';
import type { PayloadKind, PayloadOf } from '@codec/payload';
import type { DecodeResult } from '$types/common';
import { TruncatedStreamError } from '$types/errors';
import { err, ok } from '@utils/result';

/**
 * Lazily decode every frame in an in-memory byte stream
 *
 * @param kind - Payload kind of every frame in the stream
 * @param bytes - Concatenated frames
 * @returns One result per frame, ending after the first error. A trailing
 *   partial record yields TruncatedStream after all complete frames.
 *
 * @example
 * ```typescript
 * for (const result of readFrames('sensor', bytes)) {
 *   if (!result.ok) throw result.error;
 *   handle(result.value);
 * }
 * ```
 */
export function* readFrames<K extends PayloadKind>(
  kind: K,
  bytes: Buffer
): Generator<DecodeResult<Frame<PayloadOf<K>>>, void, undefined> {
  const size = FRAME_SIZES[kind];
  let offset = 0;

  while (bytes.length - offset >= size) {
    const result = decodeFrame(kind, bytes.subarray(offset, offset + size));
    yield result;
    if (!result.ok) {
      return;
    }
    offset += size;
  }

  const remaining = bytes.length - offset;
  if (remaining > 0) {
    yield err(truncated(kind, remaining));
  }
}

/**
 * Stream frames from a file one record at a time
 *
 * The returned iterable re-opens the file on every iteration, so it can be
 * walked more than once. The descriptor is closed when iteration finishes
 * or is abandoned early.
 *
 * @param kind - Payload kind of every frame in the file
 * @param path - Frame file path
 * @returns Restartable iterable of decode results
 * @throws {Error} From fs when the file cannot be opened or read
 */
export function openFrameFile<K extends PayloadKind>(
  kind: K,
  path: string
): Iterable<DecodeResult<Frame<PayloadOf<K>>>> {
  return {
    [Symbol.iterator]: function() {
      return readFrameFile(kind, path);
    },
  };
}

function* readFrameFile<K extends PayloadKind>(
  kind: K,
  path: string
): Generator<DecodeResult<Frame<PayloadOf<K>>>, void, undefined> {
  const size = FRAME_SIZES[kind];
  const chunk = Buffer.alloc(size);
  const fd = openSync(path, 'r');

  try {
    for (;;) {
      const filled = fillChunk(fd, chunk);
      if (filled === 0) {
        return;
      }
      if (filled < size) {
        yield err(truncated(kind, filled));
        return;
      }

      const result = decodeFrame(kind, chunk);
      yield result;
      if (!result.ok) {
        return;
      }
    }
  } finally {
    closeSync(fd);
  }
}

/**
 * Read until the chunk is full or the file ends
 * @returns Bytes placed in chunk
 */
function fillChunk(fd: number, chunk: Buffer): number {
  let filled = 0;
  while (filled < chunk.length) {
    const read = readSync(fd, chunk, filled, chunk.length - filled, null);
    if (read === 0) {
      break;
    }
    filled += read;
  }
  return filled;
}

function truncated(kind: PayloadKind, remaining: number): TruncatedStreamError {
  return new TruncatedStreamError(
    remaining,
    'stream ends with ' + remaining + ' stray bytes, ' + kind + ' frames are ' + FRAME_SIZES[kind] + ' bytes'
  );
}

/**
 * Drain decode results into a list, failing as a whole on the first error
 *
 * @param results - Results from readFrames or openFrameFile
 * @returns Every frame in order, or the first error
 */
export function collectFrames<F>(results: Iterable<DecodeResult<F>>): DecodeResult<F[]> {
  const frames: F[] = [];
  for (const result of results) {
    if (!result.ok) {
      return err(result.error);
    }
    frames.push(result.value);
  }
  return ok(frames);
}

/**
 * Write frames back to back, replacing the file
 *
 * @param path - Destination path; parent directories are created
 * @param frames - Frames to encode
 * @returns Number of frames written
 * @throws {SequenceOverflowError} If a frame's sequence does not fit 32 bits
 */
export function writeFrameFile(path: string, frames: Iterable<Frame>): number {
  mkdirSync(dirname(path), { recursive: true });
  const fd = openSync(path, 'w');

  let count = 0;
  try {
    for (const frame of frames) {
      writeSync(fd, encodeFrame(frame));
      count++;
    }
  } finally {
    closeSync(fd);
  }
  return count;
}
