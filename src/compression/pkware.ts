import type { TransformCallback } from 'node:stream';
import ImplodeDecoder from 'implode-decoder';
import { concatBytes } from '../binary.js';
import { CompressionError } from './errors.js';

/**
 * Decode a PKWARE DCL ("implode") stream held in one sector.
 *
 * The decoder is a Transform stream; it is driven synchronously through its
 * transform and flush steps so sector decoding stays synchronous. Output past
 * `capacity` is a resource error; a short result is left to the caller's
 * length check.
 */
export function explode(input: Uint8Array, capacity: number): Uint8Array {
  const chunks: Uint8Array[] = [];
  let total = 0;
  let failure: unknown;
  let finished = false;

  const decoder = new ImplodeDecoder();
  decoder.on('error', (err: unknown) => {
    failure ??= err;
  });
  decoder.push = (chunk: unknown): boolean => {
    if (chunk instanceof Uint8Array) {
      chunks.push(chunk);
      total += chunk.length;
    }
    return true;
  };
  const onFlush: TransformCallback = (err) => {
    if (err) failure ??= err;
    finished = true;
  };
  const onTransform: TransformCallback = (err) => {
    if (err) {
      failure ??= err;
      return;
    }
    decoder._flush(onFlush);
  };

  try {
    decoder._transform(Buffer.from(input.buffer, input.byteOffset, input.byteLength), 'binary', onTransform);
  } catch (err) {
    failure ??= err;
  }

  if (total > capacity) {
    throw new CompressionError('COMPRESSION_RESOURCE_LIMIT', 'PKWARE output exceeds the sector capacity', {
      algorithm: 'pkware',
      context: { capacity: String(capacity), produced: String(total) }
    });
  }
  if (failure !== undefined) {
    throw new CompressionError('COMPRESSION_PKWARE_BAD_DATA', 'Invalid PKWARE stream', {
      algorithm: 'pkware',
      cause: failure
    });
  }
  if (!finished) {
    throw new CompressionError('COMPRESSION_PKWARE_BAD_DATA', 'PKWARE stream did not complete', {
      algorithm: 'pkware'
    });
  }

  return concatBytes(chunks);
}
