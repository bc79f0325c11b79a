import { throwIfAborted } from './abort.js';
import { adler32 } from './adler32.js';
import { concatBytes, packUint32Words, readUint32Words } from './binary.js';
import { CompressionError } from './compression/errors.js';
import { compressSector, decompressImploded, decompressSector } from './compression/sector.js';
import type { MpqCompressionMethod } from './compression/types.js';
import { decryptBlock, encryptBlock } from './crypto/cipher.js';
import { MpqError } from './errors.js';
import { MpqFileFlags, hasFlag, type BlockEntry } from './tables/blockTable.js';

/** Everything needed to turn a file's stored bytes back into its contents. */
export type SectorDecodeOptions = {
  entryName: string;
  sectorSize: number;
  /** File key; `undefined` when the file is not encrypted. */
  key: number | undefined;
  signal?: AbortSignal | undefined;
};

type SectorSpan = { start: number; end: number; expected: number };

/**
 * Decode the `compressedSize` bytes stored at a block's position into the
 * file's `uncompressedSize` bytes.
 */
export function decodeFileData(stored: Uint8Array, entry: BlockEntry, options: SectorDecodeOptions): Uint8Array {
  const size = entry.uncompressedSize;
  if (size === 0) return new Uint8Array(0);
  if (stored.length < entry.compressedSize) {
    throw corrupt(options.entryName, 'File data is truncated', {
      available: String(stored.length),
      required: String(entry.compressedSize)
    });
  }

  const compressed = hasFlag(entry, MpqFileFlags.Compress) || hasFlag(entry, MpqFileFlags.Implode);
  let spans: SectorSpan[];
  let checksums: Uint32Array | undefined;
  if (hasFlag(entry, MpqFileFlags.SingleUnit)) {
    spans = [{ start: 0, end: entry.compressedSize, expected: size }];
  } else if (!compressed) {
    if (entry.compressedSize < size) {
      throw corrupt(options.entryName, 'Uncompressed file is shorter than its size', {
        compressedSize: String(entry.compressedSize),
        uncompressedSize: String(size)
      });
    }
    spans = rawSpans(size, options.sectorSize);
  } else {
    const table = readSectorOffsets(stored, entry, options);
    spans = table.spans;
    checksums = table.checksums;
  }

  const out = new Uint8Array(size);
  spans.forEach((span, index) => {
    throwIfAborted(options.signal);
    const sector = stored.slice(span.start, span.end);
    if (options.key !== undefined) decryptBlock(sector, (options.key + index) >>> 0);
    const expectedChecksum = checksums?.[index] ?? 0;
    if (expectedChecksum !== 0) {
      const actual = adler32(sector, 0);
      if (actual !== expectedChecksum) {
        throw corrupt(options.entryName, `Sector ${index} checksum mismatch`, {
          sector: String(index),
          expected: `0x${expectedChecksum.toString(16)}`,
          actual: `0x${actual.toString(16)}`
        });
      }
    }
    const decoded = sector.length < span.expected && compressed
      ? decompress(sector, span.expected, entry, options.entryName)
      : sector;
    if (decoded.length !== span.expected) {
      throw corrupt(options.entryName, `Sector ${index} decoded to ${decoded.length} bytes, expected ${span.expected}`, {
        sector: String(index)
      });
    }
    out.set(decoded, index * options.sectorSize);
  });
  return out;
}

function rawSpans(size: number, sectorSize: number): SectorSpan[] {
  const spans: SectorSpan[] = [];
  for (let start = 0; start < size; start += sectorSize) {
    const end = Math.min(size, start + sectorSize);
    spans.push({ start, end, expected: end - start });
  }
  return spans;
}

function readSectorOffsets(
  stored: Uint8Array,
  entry: BlockEntry,
  options: SectorDecodeOptions
): { spans: SectorSpan[]; checksums: Uint32Array | undefined } {
  const size = entry.uncompressedSize;
  const sectorCount = Math.ceil(size / options.sectorSize);
  const hasChecksums = hasFlag(entry, MpqFileFlags.SectorCrc);
  const offsetCount = sectorCount + (hasChecksums ? 2 : 1);
  const tableBytes = offsetCount * 4;
  if (tableBytes > entry.compressedSize) {
    throw corrupt(options.entryName, 'Sector offset table does not fit in the file data', {
      tableBytes: String(tableBytes),
      compressedSize: String(entry.compressedSize)
    });
  }
  const table = stored.slice(0, tableBytes);
  if (options.key !== undefined) decryptBlock(table, (options.key - 1) >>> 0);

  const offsets = readUint32Words(table, offsetCount);
  offsets.forEach((offset, i) => {
    const previous = offsets[i - 1] ?? 0;
    if (offset < previous || offset > entry.compressedSize) {
      throw corrupt(options.entryName, `Sector offset ${i} is out of order or out of range`, {
        index: String(i),
        offset: String(offset),
        compressedSize: String(entry.compressedSize)
      });
    }
  });

  const spans: SectorSpan[] = [];
  for (let i = 0; i < sectorCount; i += 1) {
    spans.push({
      start: offsets[i]!,
      end: offsets[i + 1]!,
      expected: Math.min(options.sectorSize, size - i * options.sectorSize)
    });
  }

  let checksums: Uint32Array | undefined;
  if (hasChecksums) {
    const block = stored.slice(offsets[sectorCount]!, offsets[sectorCount + 1]!);
    checksums = readChecksums(block, sectorCount, options);
  }
  return { spans, checksums };
}

function readChecksums(block: Uint8Array, sectorCount: number, options: SectorDecodeOptions): Uint32Array | undefined {
  if (block.length === 0) return undefined;
  if (options.key !== undefined) decryptBlock(block, (options.key + sectorCount) >>> 0);
  const rawSize = sectorCount * 4;
  let raw = block;
  if (block.length < rawSize) {
    try {
      raw = decompressSector(block, rawSize);
    } catch (err) {
      throw wrapCompressionError(err, options.entryName);
    }
  }
  if (raw.length !== rawSize) {
    throw corrupt(options.entryName, 'Sector checksum block has the wrong size', {
      expected: String(rawSize),
      actual: String(raw.length)
    });
  }
  return Uint32Array.from(readUint32Words(raw, sectorCount));
}

function decompress(sector: Uint8Array, expected: number, entry: BlockEntry, entryName: string): Uint8Array {
  try {
    return hasFlag(entry, MpqFileFlags.Implode)
      ? decompressImploded(sector, expected)
      : decompressSector(sector, expected);
  } catch (err) {
    throw wrapCompressionError(err, entryName);
  }
}

function wrapCompressionError(err: unknown, entryName: string): unknown {
  if (!(err instanceof CompressionError)) return err;
  if (err.code === 'COMPRESSION_UNSUPPORTED_ALGORITHM') {
    return new MpqError('MPQ_UNSUPPORTED_COMPRESSION', err.message, {
      entryName,
      context: { ...err.context },
      cause: err
    });
  }
  return new MpqError('MPQ_CORRUPT_SECTOR', err.message, {
    entryName,
    context: { ...err.context, ...(err.algorithm !== undefined ? { algorithm: err.algorithm } : {}) },
    cause: err
  });
}

function corrupt(entryName: string, message: string, context: Record<string, string>): MpqError {
  return new MpqError('MPQ_CORRUPT_SECTOR', message, { entryName, context });
}

export type SectorEncodeOptions = {
  sectorSize: number;
  compression: MpqCompressionMethod;
  key: number | undefined;
  singleUnit: boolean;
  sectorCrc: boolean;
};

/** Stored bytes for one file plus the layout flags they imply (EXISTS and FIX_KEY are the caller's). */
export function encodeFileData(data: Uint8Array, options: SectorEncodeOptions): { bytes: Uint8Array; flags: number } {
  let flags = 0;
  if (options.compression !== 'none') flags |= MpqFileFlags.Compress;
  if (options.key !== undefined) flags |= MpqFileFlags.Encrypted;
  if (options.singleUnit) flags |= MpqFileFlags.SingleUnit;
  if (data.length === 0) return { bytes: new Uint8Array(0), flags: flags >>> 0 };

  if (options.singleUnit) {
    const unit = maybeCompress(data, options.compression);
    if (options.key !== undefined) encryptBlock(unit, options.key);
    return { bytes: unit, flags: flags >>> 0 };
  }

  const sectors: Uint8Array[] = [];
  for (let start = 0; start < data.length; start += options.sectorSize) {
    sectors.push(maybeCompress(data.subarray(start, start + options.sectorSize), options.compression));
  }

  if (options.compression === 'none') {
    if (options.key !== undefined) {
      const key = options.key;
      sectors.forEach((sector, index) => encryptBlock(sector, (key + index) >>> 0));
    }
    return { bytes: concatBytes(sectors), flags: flags >>> 0 };
  }

  const withChecksums = options.sectorCrc;
  if (withChecksums) flags |= MpqFileFlags.SectorCrc;
  const checksumBlock = withChecksums ? packUint32Words(sectors.map((sector) => adler32(sector, 0))) : undefined;

  const offsetCount = sectors.length + (withChecksums ? 2 : 1);
  const offsets: number[] = [];
  let position = offsetCount * 4;
  for (const sector of sectors) {
    offsets.push(position);
    position += sector.length;
  }
  offsets.push(position);
  if (checksumBlock) offsets.push(position + checksumBlock.length);
  const table = packUint32Words(offsets);

  if (options.key !== undefined) {
    const key = options.key;
    encryptBlock(table, (key - 1) >>> 0);
    sectors.forEach((sector, index) => encryptBlock(sector, (key + index) >>> 0));
    if (checksumBlock) encryptBlock(checksumBlock, (key + sectors.length) >>> 0);
  }
  return { bytes: concatBytes([table, ...sectors, ...(checksumBlock ? [checksumBlock] : [])]), flags: flags >>> 0 };
}

/** Compressed form of `chunk` when it is strictly smaller, otherwise a copy of the raw bytes. */
function maybeCompress(chunk: Uint8Array, method: MpqCompressionMethod): Uint8Array {
  if (method === 'none') return chunk.slice();
  const packed = compressSector(chunk, method);
  return packed.length < chunk.length ? packed : chunk.slice();
}
