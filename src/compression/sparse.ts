import { readUint32BE, writeUint32BE } from '../binary.js';
import { CompressionError } from './errors.js';

const MAX_LITERAL_RUN = 0x80;
const MIN_ZERO_RUN = 3;
const MAX_ZERO_RUN = 0x7f + MIN_ZERO_RUN;

/**
 * Sparse format: a big-endian uint32 output length, then chunks. A control
 * byte with the high bit set is followed by `(byte & 0x7f) + 1` literal
 * bytes; otherwise it stands for `(byte & 0x7f) + 3` zero bytes.
 */
export function decompressSparse(input: Uint8Array, capacity: number): Uint8Array {
  if (input.length < 4) {
    throw sparseBadData('Sparse stream is missing its length prefix');
  }
  const outputLength = readUint32BE(input, 0);
  if (outputLength > capacity) {
    throw new CompressionError('COMPRESSION_RESOURCE_LIMIT', 'Sparse output exceeds the sector capacity', {
      algorithm: 'sparse',
      context: { outputLength: String(outputLength), capacity: String(capacity) }
    });
  }
  const out = new Uint8Array(outputLength);
  let inPos = 4;
  let outPos = 0;
  while (inPos < input.length) {
    const control = input[inPos++]!;
    if ((control & 0x80) !== 0) {
      const run = (control & 0x7f) + 1;
      if (inPos + run > input.length) throw sparseBadData('Sparse literal run is truncated');
      if (outPos + run > outputLength) throw sparseBadData('Sparse literal run overflows the output');
      out.set(input.subarray(inPos, inPos + run), outPos);
      inPos += run;
      outPos += run;
    } else {
      const run = (control & 0x7f) + MIN_ZERO_RUN;
      if (outPos + run > outputLength) throw sparseBadData('Sparse zero run overflows the output');
      outPos += run;
    }
  }
  if (outPos !== outputLength) {
    throw sparseBadData(`Sparse stream produced ${outPos} of ${outputLength} bytes`);
  }
  return out;
}

export function compressSparse(input: Uint8Array): Uint8Array {
  const out: number[] = [0, 0, 0, 0];
  let literalStart = -1;

  const flushLiterals = (end: number) => {
    if (literalStart < 0) return;
    out.push(0x80 | (end - literalStart - 1));
    for (let i = literalStart; i < end; i += 1) out.push(input[i]!);
    literalStart = -1;
  };

  let pos = 0;
  while (pos < input.length) {
    const zeros = countZeros(input, pos, MAX_ZERO_RUN);
    if (zeros >= MIN_ZERO_RUN) {
      flushLiterals(pos);
      out.push(zeros - MIN_ZERO_RUN);
      pos += zeros;
      continue;
    }
    if (literalStart < 0) literalStart = pos;
    pos += 1;
    if (pos - literalStart === MAX_LITERAL_RUN) flushLiterals(pos);
  }
  flushLiterals(pos);

  const encoded = Uint8Array.from(out);
  writeUint32BE(encoded, 0, input.length);
  return encoded;
}

function countZeros(input: Uint8Array, start: number, max: number): number {
  let count = 0;
  while (count < max && start + count < input.length && input[start + count] === 0) count += 1;
  return count;
}

function sparseBadData(message: string): CompressionError {
  return new CompressionError('COMPRESSION_SPARSE_BAD_DATA', message, { algorithm: 'sparse' });
}
