export { CompressionError } from './errors.js';
export type { CompressionErrorCode } from './errors.js';
export { MpqCompression } from './types.js';
export type { MpqCompressionCodec, MpqCompressionMethod } from './types.js';
export { getCompressionCodec, listCompressionCodecs, registerCompressionCodec } from './registry.js';
export { compressSector, decompressImploded, decompressSector } from './sector.js';
