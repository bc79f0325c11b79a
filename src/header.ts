import { readUint16LE, readUint32LE, readUint64LE, writeUint16LE, writeUint32LE, writeUint64LE } from './binary.js';
import { MpqError } from './errors.js';

/** On-disk format versions. */
export const MpqFormat = {
  Basic: 0,
  ExtendedV1: 1,
  ExtendedV2: 2,
  ExtendedV3: 3
} as const;

export type MpqFormatVersion = (typeof MpqFormat)[keyof typeof MpqFormat];

/** `MPQ\x1A` read as a little-endian uint32. */
export const MPQ_HEADER_SIGNATURE = 0x1a51504d;
/** `MPQ\x1B` read as a little-endian uint32. */
export const MPQ_USER_DATA_SIGNATURE = 0x1b51504d;

/** Persisted header size for each format version. */
export const HEADER_SIZES: Readonly<Record<MpqFormatVersion, number>> = Object.freeze({
  0: 32,
  1: 44,
  2: 68,
  3: 208
});

export const HASH_ENTRY_SIZE = 16;
export const BLOCK_ENTRY_SIZE = 16;
export const HI_BLOCK_ENTRY_SIZE = 2;
export const MD5_DIGEST_SIZE = 16;

const OFFSET_MASK_48 = 0x0000ffffffffffffn;
const HIGH_BITS_MASK = 0x0000ffff00000000n;

type BasicFields = {
  /** Header size as stored; kept verbatim so the header serializes back unchanged. */
  readonly headerSize: number;
  /** 32-bit archive size field. */
  readonly archiveSize: number;
  /** Sector size is `512 << sectorSizeShift`. */
  readonly sectorSizeShift: number;
  /** Low 32 bits of the hash table offset. */
  readonly hashTableOffset: number;
  /** Low 32 bits of the block table offset. */
  readonly blockTableOffset: number;
  readonly hashTableEntries: number;
  readonly blockTableEntries: number;
};

type ExtendedV1Fields = {
  readonly hiBlockTableOffset: bigint;
  readonly hashTableOffsetHigh: number;
  readonly blockTableOffsetHigh: number;
};

type ExtendedV2Fields = {
  readonly archiveSize64: bigint;
  readonly betTableOffset: bigint;
  readonly hetTableOffset: bigint;
};

type ExtendedV3Fields = {
  readonly hashTableCompressedSize: bigint;
  readonly blockTableCompressedSize: bigint;
  readonly hiBlockTableCompressedSize: bigint;
  readonly hetTableCompressedSize: bigint;
  readonly betTableCompressedSize: bigint;
  readonly rawChunkSize: number;
  readonly md5BlockTable: Uint8Array;
  readonly md5HashTable: Uint8Array;
  readonly md5HiBlockTable: Uint8Array;
  readonly md5BetTable: Uint8Array;
  readonly md5HetTable: Uint8Array;
  /** Covers the header from the signature through `md5HetTable`. */
  readonly md5Header: Uint8Array;
};

export type MpqBasicHeader = { readonly formatVersion: 0 } & BasicFields;
export type MpqExtendedV1Header = { readonly formatVersion: 1 } & BasicFields & ExtendedV1Fields;
export type MpqExtendedV2Header = { readonly formatVersion: 2 } & BasicFields & ExtendedV1Fields & ExtendedV2Fields;
export type MpqExtendedV3Header = { readonly formatVersion: 3 } & BasicFields &
  ExtendedV1Fields &
  ExtendedV2Fields &
  ExtendedV3Fields;

/** Archive header; extended fields exist only on the versions that persist them. */
export type MpqHeader = MpqBasicHeader | MpqExtendedV1Header | MpqExtendedV2Header | MpqExtendedV3Header;

/** Header variants carrying offset high bits and a hi-block table. */
export type MpqExtendedHeader = Exclude<MpqHeader, MpqBasicHeader>;

export function isFormatVersion(value: number): value is MpqFormatVersion {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

/** Parse a header from bytes starting at its signature. */
export function parseHeader(bytes: Uint8Array): MpqHeader {
  if (bytes.length < HEADER_SIZES[0]) {
    throw new MpqError('MPQ_TRUNCATED_HEADER', 'Not enough bytes for an MPQ header', {
      context: { available: String(bytes.length), required: String(HEADER_SIZES[0]) }
    });
  }
  if (readUint32LE(bytes, 0) !== MPQ_HEADER_SIGNATURE) {
    throw new MpqError('MPQ_BAD_SIGNATURE', 'Missing MPQ header signature');
  }
  const formatVersion = readUint16LE(bytes, 12);
  if (!isFormatVersion(formatVersion)) {
    throw new MpqError('MPQ_UNSUPPORTED_FORMAT', `Unsupported MPQ format version ${formatVersion}`, {
      context: { formatVersion: String(formatVersion) }
    });
  }
  const required = HEADER_SIZES[formatVersion];
  const headerSize = readUint32LE(bytes, 4);
  if (formatVersion !== MpqFormat.Basic && headerSize < required) {
    throw new MpqError('MPQ_BAD_HEADER', `Header size ${headerSize} is too small for format ${formatVersion}`, {
      context: { headerSize: String(headerSize), required: String(required) }
    });
  }
  if (bytes.length < required) {
    throw new MpqError('MPQ_TRUNCATED_HEADER', `Format ${formatVersion} header needs ${required} bytes`, {
      context: { available: String(bytes.length), required: String(required) }
    });
  }

  const basic: BasicFields = {
    headerSize,
    archiveSize: readUint32LE(bytes, 8),
    sectorSizeShift: readUint16LE(bytes, 14),
    hashTableOffset: readUint32LE(bytes, 16),
    blockTableOffset: readUint32LE(bytes, 20),
    hashTableEntries: readUint32LE(bytes, 24),
    blockTableEntries: readUint32LE(bytes, 28)
  };
  if (formatVersion === MpqFormat.Basic) {
    return { formatVersion, ...basic };
  }

  const v1: ExtendedV1Fields = {
    hiBlockTableOffset: readUint64LE(bytes, 32),
    hashTableOffsetHigh: readUint16LE(bytes, 40),
    blockTableOffsetHigh: readUint16LE(bytes, 42)
  };
  if (formatVersion === MpqFormat.ExtendedV1) {
    return { formatVersion, ...basic, ...v1 };
  }

  const v2: ExtendedV2Fields = {
    archiveSize64: readUint64LE(bytes, 44),
    betTableOffset: readUint64LE(bytes, 52),
    hetTableOffset: readUint64LE(bytes, 60)
  };
  if (formatVersion === MpqFormat.ExtendedV2) {
    return { formatVersion, ...basic, ...v1, ...v2 };
  }

  const digest = (offset: number) => bytes.slice(offset, offset + MD5_DIGEST_SIZE);
  return {
    formatVersion,
    ...basic,
    ...v1,
    ...v2,
    hashTableCompressedSize: readUint64LE(bytes, 68),
    blockTableCompressedSize: readUint64LE(bytes, 76),
    hiBlockTableCompressedSize: readUint64LE(bytes, 84),
    hetTableCompressedSize: readUint64LE(bytes, 92),
    betTableCompressedSize: readUint64LE(bytes, 100),
    rawChunkSize: readUint32LE(bytes, 108),
    md5BlockTable: digest(112),
    md5HashTable: digest(128),
    md5HiBlockTable: digest(144),
    md5BetTable: digest(160),
    md5HetTable: digest(176),
    md5Header: digest(192)
  };
}

/** Serialize a header to exactly the number of bytes its format version persists. */
export function serializeHeader(header: MpqHeader): Uint8Array {
  const out = new Uint8Array(HEADER_SIZES[header.formatVersion]);
  writeUint32LE(out, 0, MPQ_HEADER_SIGNATURE);
  writeUint32LE(out, 4, header.headerSize);
  writeUint32LE(out, 8, header.archiveSize);
  writeUint16LE(out, 12, header.formatVersion);
  writeUint16LE(out, 14, header.sectorSizeShift);
  writeUint32LE(out, 16, header.hashTableOffset);
  writeUint32LE(out, 20, header.blockTableOffset);
  writeUint32LE(out, 24, header.hashTableEntries);
  writeUint32LE(out, 28, header.blockTableEntries);
  if (header.formatVersion === MpqFormat.Basic) return out;

  writeUint64LE(out, 32, header.hiBlockTableOffset);
  writeUint16LE(out, 40, header.hashTableOffsetHigh);
  writeUint16LE(out, 42, header.blockTableOffsetHigh);
  if (header.formatVersion === MpqFormat.ExtendedV1) return out;

  writeUint64LE(out, 44, header.archiveSize64);
  writeUint64LE(out, 52, header.betTableOffset);
  writeUint64LE(out, 60, header.hetTableOffset);
  if (header.formatVersion === MpqFormat.ExtendedV2) return out;

  writeUint64LE(out, 68, header.hashTableCompressedSize);
  writeUint64LE(out, 76, header.blockTableCompressedSize);
  writeUint64LE(out, 84, header.hiBlockTableCompressedSize);
  writeUint64LE(out, 92, header.hetTableCompressedSize);
  writeUint64LE(out, 100, header.betTableCompressedSize);
  writeUint32LE(out, 108, header.rawChunkSize);
  out.set(header.md5BlockTable.subarray(0, MD5_DIGEST_SIZE), 112);
  out.set(header.md5HashTable.subarray(0, MD5_DIGEST_SIZE), 128);
  out.set(header.md5HiBlockTable.subarray(0, MD5_DIGEST_SIZE), 144);
  out.set(header.md5BetTable.subarray(0, MD5_DIGEST_SIZE), 160);
  out.set(header.md5HetTable.subarray(0, MD5_DIGEST_SIZE), 176);
  out.set(header.md5Header.subarray(0, MD5_DIGEST_SIZE), 192);
  return out;
}

/** Minimal valid header for an empty archive of the given format. */
export function createHeader(formatVersion: 0): MpqBasicHeader;
export function createHeader(formatVersion: 1): MpqExtendedV1Header;
export function createHeader(formatVersion: 2): MpqExtendedV2Header;
export function createHeader(formatVersion: 3): MpqExtendedV3Header;
export function createHeader(formatVersion: MpqFormatVersion): MpqHeader;
export function createHeader(formatVersion: MpqFormatVersion): MpqHeader {
  const headerSize = HEADER_SIZES[formatVersion];
  const basic: BasicFields = {
    headerSize,
    archiveSize: headerSize,
    sectorSizeShift: 3,
    hashTableOffset: 0,
    blockTableOffset: 0,
    hashTableEntries: 0,
    blockTableEntries: 0
  };
  const v1: ExtendedV1Fields = { hiBlockTableOffset: 0n, hashTableOffsetHigh: 0, blockTableOffsetHigh: 0 };
  const v2: ExtendedV2Fields = { archiveSize64: BigInt(headerSize), betTableOffset: 0n, hetTableOffset: 0n };
  switch (formatVersion) {
    case MpqFormat.Basic:
      return { formatVersion, ...basic };
    case MpqFormat.ExtendedV1:
      return { formatVersion, ...basic, ...v1 };
    case MpqFormat.ExtendedV2:
      return { formatVersion, ...basic, ...v1, ...v2 };
    case MpqFormat.ExtendedV3:
      return {
        formatVersion,
        ...basic,
        ...v1,
        ...v2,
        hashTableCompressedSize: 0n,
        blockTableCompressedSize: 0n,
        hiBlockTableCompressedSize: 0n,
        hetTableCompressedSize: 0n,
        betTableCompressedSize: 0n,
        rawChunkSize: 0,
        md5BlockTable: new Uint8Array(MD5_DIGEST_SIZE),
        md5HashTable: new Uint8Array(MD5_DIGEST_SIZE),
        md5HiBlockTable: new Uint8Array(MD5_DIGEST_SIZE),
        md5BetTable: new Uint8Array(MD5_DIGEST_SIZE),
        md5HetTable: new Uint8Array(MD5_DIGEST_SIZE),
        md5Header: new Uint8Array(MD5_DIGEST_SIZE)
      };
    default: {
      const exhaustive: never = formatVersion;
      return exhaustive;
    }
  }
}

/** Combine a 32-bit base offset with its 16 high bits into a 48-bit offset. */
export function mergeHighBits(baseBits: number, highBits: number): bigint {
  const high = (BigInt(highBits) << 32n) & HIGH_BITS_MASK;
  return (high + BigInt(baseBits >>> 0)) & OFFSET_MASK_48;
}

/** Inverse of {@link mergeHighBits}. */
export function splitHighBits(offset: bigint): { baseBits: number; highBits: number } {
  const masked = offset & OFFSET_MASK_48;
  return {
    baseBits: Number(masked & 0xffffffffn),
    highBits: Number(masked >> 32n)
  };
}

export function getHashTableOffset(header: MpqHeader): bigint {
  if (header.formatVersion === MpqFormat.Basic) return BigInt(header.hashTableOffset);
  return mergeHighBits(header.hashTableOffset, header.hashTableOffsetHigh);
}

export function getBlockTableOffset(header: MpqHeader): bigint {
  if (header.formatVersion === MpqFormat.Basic) return BigInt(header.blockTableOffset);
  return mergeHighBits(header.blockTableOffset, header.blockTableOffsetHigh);
}

export function getHashTableSize(header: MpqHeader): bigint {
  return BigInt(header.hashTableEntries) * BigInt(HASH_ENTRY_SIZE);
}

export function getBlockTableSize(header: MpqHeader): bigint {
  return BigInt(header.blockTableEntries) * BigInt(BLOCK_ENTRY_SIZE);
}

export function getHiBlockTableSize(header: MpqHeader): bigint {
  return BigInt(header.blockTableEntries) * BigInt(HI_BLOCK_ENTRY_SIZE);
}

export function getSectorSize(header: MpqHeader): number {
  return 512 * 2 ** header.sectorSizeShift;
}

/**
 * Total archive size.
 *
 * Basic stores a 32-bit size and ExtendedV2+ a 64-bit one. ExtendedV1 has no
 * reliable stored total, so the size is the furthest end of the hash table,
 * the block table and the hi-block table.
 */
export function getArchiveSize(header: MpqHeader): bigint {
  switch (header.formatVersion) {
    case MpqFormat.Basic:
      return BigInt(header.archiveSize);
    case MpqFormat.ExtendedV1: {
      const ends = [
        getHashTableOffset(header) + getHashTableSize(header),
        getBlockTableOffset(header) + getBlockTableSize(header)
      ];
      if (header.hiBlockTableOffset !== 0n) {
        ends.push(header.hiBlockTableOffset + getHiBlockTableSize(header));
      }
      return ends.reduce((furthest, end) => (end > furthest ? end : furthest), 0n);
    }
    case MpqFormat.ExtendedV2:
    case MpqFormat.ExtendedV3:
      return header.archiveSize64;
    default: {
      const exhaustive: never = header;
      return exhaustive;
    }
  }
}

/**
 * Whether the hash table is stored compressed. Only ExtendedV3 records a
 * compressed size; the table is compressed when that size is non-zero and
 * smaller than the raw table.
 */
export function isHashTableCompressed(header: MpqHeader): boolean {
  if (header.formatVersion !== MpqFormat.ExtendedV3) return false;
  const compressed = header.hashTableCompressedSize;
  return compressed !== 0n && compressed < getHashTableSize(header);
}

/** Block table counterpart of {@link isHashTableCompressed}. */
export function isBlockTableCompressed(header: MpqHeader): boolean {
  if (header.formatVersion !== MpqFormat.ExtendedV3) return false;
  const compressed = header.blockTableCompressedSize;
  return compressed !== 0n && compressed < getBlockTableSize(header);
}

/** Bytes the hash table occupies on disk. */
export function getStoredHashTableSize(header: MpqHeader): bigint {
  return isHashTableCompressed(header) && header.formatVersion === MpqFormat.ExtendedV3
    ? header.hashTableCompressedSize
    : getHashTableSize(header);
}

/** Bytes the block table occupies on disk. */
export function getStoredBlockTableSize(header: MpqHeader): bigint {
  return isBlockTableCompressed(header) && header.formatVersion === MpqFormat.ExtendedV3
    ? header.blockTableCompressedSize
    : getBlockTableSize(header);
}
