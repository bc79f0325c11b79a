import { CompressionError } from './errors.js';
import { getCompressionCodec } from './registry.js';
import { MpqCompression, type MpqCompressionCodec, type MpqCompressionMethod } from './types.js';

/** Bits in the order their codecs are undone; sparse is always last. */
const DECOMPRESSION_ORDER = [
  MpqCompression.Bzip2,
  MpqCompression.PkWare,
  MpqCompression.Zlib,
  MpqCompression.Huffman,
  MpqCompression.AdpcmStereo,
  MpqCompression.AdpcmMono,
  MpqCompression.Sparse
] as const;

const KNOWN_BITS = DECOMPRESSION_ORDER.reduce<number>((mask, bit) => mask | bit, 0);

const COMPRESSION_STAGES: Record<Exclude<MpqCompressionMethod, 'none'>, readonly number[]> = {
  zlib: [MpqCompression.Zlib],
  sparse: [MpqCompression.Sparse],
  'sparse+zlib': [MpqCompression.Sparse, MpqCompression.Zlib]
};

/**
 * Undo the compression named by the leading mask byte of a sector.
 * `expectedSize` bounds the final output; intermediate stages may run
 * slightly larger, since sparse output can exceed its input.
 */
export function decompressSector(data: Uint8Array, expectedSize: number): Uint8Array {
  const mask = data[0];
  if (mask === undefined) {
    throw new CompressionError('COMPRESSION_BAD_DATA', 'Compressed sector has no compression mask');
  }
  const payload = data.subarray(1);
  if (mask === MpqCompression.Lzma) {
    return requireCodec(mask).decompress(payload, expectedSize);
  }
  const unknown = mask & ~KNOWN_BITS;
  if (unknown !== 0) {
    throw unsupported(mask, `Unknown compression mask 0x${mask.toString(16).padStart(2, '0')}`);
  }
  const stages = DECOMPRESSION_ORDER.filter((bit) => (mask & bit) !== 0).map(requireCodec);
  let current = payload;
  stages.forEach((codec, index) => {
    const isLast = index === stages.length - 1;
    current = codec.decompress(current, isLast ? expectedSize : intermediateCapacity(expectedSize));
  });
  return current;
}

/** Decode a sector of a file stored with the implode flag: PKWARE data with no mask byte. */
export function decompressImploded(data: Uint8Array, expectedSize: number): Uint8Array {
  return requireCodec(MpqCompression.PkWare).decompress(data, expectedSize);
}

/** Compress a sector and prefix the mask byte. The caller keeps the result only when it is smaller. */
export function compressSector(data: Uint8Array, method: Exclude<MpqCompressionMethod, 'none'>): Uint8Array {
  let mask = 0;
  let current = data;
  for (const bit of COMPRESSION_STAGES[method]) {
    const codec = requireCodec(bit);
    if (!codec.compress) {
      throw unsupported(bit, `Codec ${codec.name} cannot compress`);
    }
    current = codec.compress(current);
    mask |= bit;
  }
  const out = new Uint8Array(current.length + 1);
  out[0] = mask;
  out.set(current, 1);
  return out;
}

function requireCodec(mask: number): MpqCompressionCodec {
  const codec = getCompressionCodec(mask);
  if (!codec) {
    throw unsupported(mask, `Compression 0x${mask.toString(16).padStart(2, '0')} is not supported`);
  }
  return codec;
}

function intermediateCapacity(expectedSize: number): number {
  return expectedSize + Math.ceil(expectedSize / 64) + 16;
}

function unsupported(mask: number, message: string): CompressionError {
  return new CompressionError('COMPRESSION_UNSUPPORTED_ALGORITHM', message, {
    context: { mask: `0x${mask.toString(16).padStart(2, '0')}` }
  });
}
