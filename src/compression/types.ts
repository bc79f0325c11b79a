/** Compression mask bits found in the first byte of a compressed sector. */
export const MpqCompression = {
  Huffman: 0x01,
  Zlib: 0x02,
  PkWare: 0x08,
  Bzip2: 0x10,
  Sparse: 0x20,
  AdpcmMono: 0x40,
  AdpcmStereo: 0x80,
  /** Whole-byte value rather than a bit; never combined with others. */
  Lzma: 0x12
} as const;

/** Compression applied by the writer. Sparse runs before zlib when both are named. */
export type MpqCompressionMethod = 'none' | 'zlib' | 'sparse' | 'sparse+zlib';

/** Codec interface for one MPQ compression bit. */
export type MpqCompressionCodec = {
  /** Mask bit (or the LZMA byte value) the codec answers to. */
  mask: number;
  name: string;
  /** Decode `input`; `capacity` bounds the output size. */
  decompress(input: Uint8Array, capacity: number): Uint8Array;
  compress?(input: Uint8Array): Uint8Array;
};
