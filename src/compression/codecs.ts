import { deflateSync, inflateSync } from 'node:zlib';
import { decompressBzip2 } from './bzip2.js';
import { CompressionError } from './errors.js';
import { explode } from './pkware.js';
import { compressSparse, decompressSparse } from './sparse.js';
import { MpqCompression, type MpqCompressionCodec } from './types.js';

export const ZLIB_CODEC: MpqCompressionCodec = {
  mask: MpqCompression.Zlib,
  name: 'zlib',
  decompress(input, capacity) {
    try {
      return new Uint8Array(inflateSync(input, { maxOutputLength: Math.max(1, capacity) }));
    } catch (err) {
      if (err instanceof RangeError) {
        throw new CompressionError('COMPRESSION_RESOURCE_LIMIT', 'zlib output exceeds the sector capacity', {
          algorithm: 'zlib',
          context: { capacity: String(capacity) },
          cause: err
        });
      }
      throw new CompressionError('COMPRESSION_ZLIB_BAD_DATA', 'Invalid zlib stream', { algorithm: 'zlib', cause: err });
    }
  },
  compress(input) {
    return new Uint8Array(deflateSync(input));
  }
};

export const BZIP2_CODEC: MpqCompressionCodec = {
  mask: MpqCompression.Bzip2,
  name: 'bzip2',
  decompress: decompressBzip2
};

export const PKWARE_CODEC: MpqCompressionCodec = {
  mask: MpqCompression.PkWare,
  name: 'pkware',
  decompress: explode
};

export const SPARSE_CODEC: MpqCompressionCodec = {
  mask: MpqCompression.Sparse,
  name: 'sparse',
  decompress: decompressSparse,
  compress: compressSparse
};
