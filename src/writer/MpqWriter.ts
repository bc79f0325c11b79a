import { createHash } from 'node:crypto';
import { throwIfAborted } from '../abort.js';
import type { MpqCompressionMethod } from '../compression/types.js';
import { deriveFileKey, encryptBlock } from '../crypto/cipher.js';
import { BLOCK_TABLE_KEY, HASH_TABLE_KEY, foldName } from '../crypto/hash.js';
import { MpqError } from '../errors.js';
import {
  HEADER_SIZES,
  MD5_DIGEST_SIZE,
  MpqFormat,
  createHeader,
  serializeHeader,
  splitHighBits,
  type MpqFormatVersion,
  type MpqHeader
} from '../header.js';
import { FileSink } from '../node/Sink.js';
import { LISTFILE_NAME, buildListfile } from '../reader/listfile.js';
import { encodeFileData } from '../sectors.js';
import { BlockTable, MpqFileFlags, type BlockEntry } from '../tables/blockTable.js';
import { HashTable, LOCALE_NEUTRAL, PLATFORM_DEFAULT } from '../tables/hashTable.js';
import { WebWritableSink, type Sink } from './Sink.js';

export type MpqWriterOptions = {
  /** Header version to write. Defaults to Basic. */
  format?: MpqFormatVersion;
  /** Sector size is `512 << sectorSizeShift`. Defaults to 3. */
  sectorSizeShift?: number;
  /** Power of two. Defaults to the smallest power of two at least twice the file count, and at least 16. */
  hashTableSize?: number;
  /** Write a `(listfile)` naming every added file. Defaults to true. */
  listfile?: boolean;
  signal?: AbortSignal;
};

export type MpqAddOptions = {
  compression?: MpqCompressionMethod;
  encrypt?: boolean;
  /** Adjust the file key by position and size; implies `encrypt`. */
  fixKey?: boolean;
  singleUnit?: boolean;
  /** Store Adler-32 sector checksums. Ignored for single-unit and uncompressed files. */
  sectorCrc?: boolean;
  locale?: number;
  platform?: number;
  signal?: AbortSignal;
};

type PendingFile = {
  name: string;
  locale: number;
  platform: number;
  block: BlockEntry;
  bytes: Uint8Array;
};

const MAX_SECTOR_SIZE_SHIFT = 23;
const MIN_HASH_TABLE_SIZE = 16;

/** Build an MPQ archive in memory and write it to a sink on close. */
export class MpqWriter {
  private readonly files: PendingFile[] = [];
  private readonly keys = new Set<string>();
  private readonly format: MpqFormatVersion;
  private readonly sectorSizeShift: number;
  private readonly hashTableSize: number | undefined;
  private readonly writeListfile: boolean;
  private readonly signal: AbortSignal | undefined;
  private dataSize = 0n;
  private closed = false;

  private constructor(
    private readonly sink: Sink,
    options?: MpqWriterOptions
  ) {
    this.format = options?.format ?? MpqFormat.Basic;
    this.sectorSizeShift = options?.sectorSizeShift ?? 3;
    if (!Number.isInteger(this.sectorSizeShift) || this.sectorSizeShift < 0 || this.sectorSizeShift > MAX_SECTOR_SIZE_SHIFT) {
      throw new RangeError(`sectorSizeShift must be an integer between 0 and ${MAX_SECTOR_SIZE_SHIFT}`);
    }
    this.hashTableSize = options?.hashTableSize;
    if (this.hashTableSize !== undefined) {
      // Rejects sizes that are not a power of two.
      new HashTable(this.hashTableSize);
    }
    this.writeListfile = options?.listfile ?? true;
    this.signal = options?.signal;
  }

  static toWritable(writable: WritableStream<Uint8Array>, options?: MpqWriterOptions): MpqWriter {
    return new MpqWriter(new WebWritableSink(writable), options);
  }

  /** Open `path` for writing; a path that cannot be created rejects here rather than on close. */
  static async toFile(path: string | URL, options?: MpqWriterOptions): Promise<MpqWriter> {
    const sink = await FileSink.create(path);
    try {
      return new MpqWriter(sink, options);
    } catch (err) {
      await sink.abort();
      throw err;
    }
  }

  static toSink(sink: Sink, options?: MpqWriterOptions): MpqWriter {
    return new MpqWriter(sink, options);
  }

  /** Encode a file and queue it for the archive. */
  async add(name: string, data: Uint8Array, options?: MpqAddOptions): Promise<void> {
    throwIfAborted(options?.signal ?? this.signal);
    if (this.closed) {
      throw new MpqError('MPQ_WRITER_CLOSED', 'Cannot add files after close', { entryName: name });
    }
    if (name.length === 0 || name.includes('\u0000')) {
      throw new MpqError('MPQ_UNSUPPORTED_FEATURE', 'File names must be non-empty and must not contain NUL', {
        entryName: name
      });
    }
    const locale = options?.locale ?? LOCALE_NEUTRAL;
    const platform = options?.platform ?? PLATFORM_DEFAULT;
    const key = fileKey(name, locale, platform);
    if (this.keys.has(key)) {
      throw new MpqError('MPQ_DUPLICATE_ENTRY', `Duplicate entry: ${name}`, {
        entryName: name,
        context: { locale: String(locale), platform: String(platform) }
      });
    }
    if (this.hashTableSize !== undefined && this.files.length >= this.hashTableSize) {
      throw new MpqError('MPQ_HASH_TABLE_FULL', `Hash table of ${this.hashTableSize} entries is full`, {
        entryName: name
      });
    }
    this.keys.add(key);
    this.files.push(this.encode(name, data, locale, platform, options));
  }

  /** Lay out tables and header, write the archive and close the sink. */
  async close(): Promise<void> {
    const signal = this.signal;
    if (this.closed) {
      throw new MpqError('MPQ_WRITER_CLOSED', 'Writer is already closed');
    }
    this.closed = true;

    try {
      throwIfAborted(signal);
      if (this.writeListfile && !this.keys.has(fileKey(LISTFILE_NAME, LOCALE_NEUTRAL, PLATFORM_DEFAULT))) {
        const names = [...new Set(this.files.map((file) => file.name))];
        this.files.push(
          this.encode(LISTFILE_NAME, buildListfile(names), LOCALE_NEUTRAL, PLATFORM_DEFAULT, { compression: 'zlib' })
        );
      }

      const hashTableSize = this.hashTableSize ?? defaultHashTableSize(this.files.length);
      if (this.files.length > hashTableSize) {
        throw new MpqError(
          'MPQ_HASH_TABLE_FULL',
          `Hash table of ${hashTableSize} entries cannot hold ${this.files.length} files`,
          { context: { hashTableSize: String(hashTableSize), files: String(this.files.length) } }
        );
      }
      const hashTable = new HashTable(hashTableSize);
      this.files.forEach((file, blockIndex) => {
        hashTable.insert({ name: file.name, locale: file.locale, platform: file.platform }, blockIndex);
      });
      const blockTable = BlockTable.from(this.files.map((file) => file.block));

      const hashBytes = hashTable.encode();
      encryptBlock(hashBytes, HASH_TABLE_KEY);
      const blockBytes = blockTable.encode();
      encryptBlock(blockBytes, BLOCK_TABLE_KEY);
      const hiBlockBytes = this.format === MpqFormat.Basic ? undefined : blockTable.encodeHighBits();

      const headerSize = BigInt(HEADER_SIZES[this.format]);
      const hashTableOffset = headerSize + this.dataSize;
      const blockTableOffset = hashTableOffset + BigInt(hashBytes.length);
      const hiBlockTableOffset = blockTableOffset + BigInt(blockBytes.length);
      const archiveSize = hiBlockTableOffset + BigInt(hiBlockBytes?.length ?? 0);

      const header = buildHeader(this.format, {
        sectorSizeShift: this.sectorSizeShift,
        hashTableOffset,
        blockTableOffset,
        hiBlockTableOffset,
        hashTableEntries: hashTable.entryCount,
        blockTableEntries: blockTable.size,
        archiveSize,
        hashBytes,
        blockBytes,
        hiBlockBytes: hiBlockBytes ?? new Uint8Array(0)
      });

      await this.sink.write(serializeHeader(header));
      for (const file of this.files) {
        throwIfAborted(signal);
        await this.sink.write(file.bytes);
      }
      await this.sink.write(hashBytes);
      await this.sink.write(blockBytes);
      if (hiBlockBytes) await this.sink.write(hiBlockBytes);
    } catch (err) {
      await this.release(err);
      throw err;
    }
    await this.sink.close();
  }

  /** Abort the sink after a failed close, or close it when it cannot abort. */
  private async release(reason: unknown): Promise<void> {
    if (this.sink.abort) {
      await this.sink.abort(reason);
    } else {
      await this.sink.close();
    }
  }

  private encode(
    name: string,
    data: Uint8Array,
    locale: number,
    platform: number,
    options: MpqAddOptions | undefined
  ): PendingFile {
    const filePosition = BigInt(HEADER_SIZES[this.format]) + this.dataSize;
    if (this.format === MpqFormat.Basic && filePosition > 0xffffffffn) {
      throw new MpqError('MPQ_LIMIT_EXCEEDED', 'Basic archives cannot address data past 4 GiB', {
        entryName: name,
        offset: filePosition
      });
    }
    const fixKey = options?.fixKey ?? false;
    const encrypted = fixKey || (options?.encrypt ?? false);
    const encoded = encodeFileData(data, {
      sectorSize: 512 * 2 ** this.sectorSizeShift,
      compression: options?.compression ?? 'none',
      key: encrypted ? deriveFileKey(name, filePosition, data.length, fixKey) : undefined,
      singleUnit: options?.singleUnit ?? false,
      sectorCrc: options?.sectorCrc ?? false
    });
    this.dataSize += BigInt(encoded.bytes.length);
    const flags = (MpqFileFlags.Exists | encoded.flags | (fixKey ? MpqFileFlags.FixKey : 0)) >>> 0;
    return {
      name,
      locale,
      platform,
      bytes: encoded.bytes,
      block: {
        filePosition,
        compressedSize: encoded.bytes.length,
        uncompressedSize: data.length,
        flags
      }
    };
  }
}

type HeaderLayout = {
  sectorSizeShift: number;
  hashTableOffset: bigint;
  blockTableOffset: bigint;
  hiBlockTableOffset: bigint;
  hashTableEntries: number;
  blockTableEntries: number;
  archiveSize: bigint;
  hashBytes: Uint8Array;
  blockBytes: Uint8Array;
  hiBlockBytes: Uint8Array;
};

/** The header digest covers everything before its own field. */
const HEADER_DIGEST_END = HEADER_SIZES[MpqFormat.ExtendedV3] - MD5_DIGEST_SIZE;

function buildHeader(format: MpqFormatVersion, layout: HeaderLayout): MpqHeader {
  const hash = splitHighBits(layout.hashTableOffset);
  const block = splitHighBits(layout.blockTableOffset);
  const basic = {
    archiveSize: Number(layout.archiveSize > 0xffffffffn ? 0xffffffffn : layout.archiveSize),
    sectorSizeShift: layout.sectorSizeShift,
    hashTableOffset: hash.baseBits,
    blockTableOffset: block.baseBits,
    hashTableEntries: layout.hashTableEntries,
    blockTableEntries: layout.blockTableEntries
  };
  const v1 = {
    hiBlockTableOffset: layout.hiBlockTableOffset,
    hashTableOffsetHigh: hash.highBits,
    blockTableOffsetHigh: block.highBits
  };
  switch (format) {
    case MpqFormat.Basic:
      return { ...createHeader(format), ...basic };
    case MpqFormat.ExtendedV1:
      return { ...createHeader(format), ...basic, ...v1 };
    case MpqFormat.ExtendedV2:
      return { ...createHeader(format), ...basic, ...v1, archiveSize64: layout.archiveSize };
    case MpqFormat.ExtendedV3: {
      const unsigned = {
        ...createHeader(format),
        ...basic,
        ...v1,
        archiveSize64: layout.archiveSize,
        hashTableCompressedSize: BigInt(layout.hashBytes.length),
        blockTableCompressedSize: BigInt(layout.blockBytes.length),
        hiBlockTableCompressedSize: BigInt(layout.hiBlockBytes.length),
        md5HashTable: md5(layout.hashBytes),
        md5BlockTable: md5(layout.blockBytes),
        md5HiBlockTable: md5(layout.hiBlockBytes)
      };
      return { ...unsigned, md5Header: md5(serializeHeader(unsigned).subarray(0, HEADER_DIGEST_END)) };
    }
    default: {
      const exhaustive: never = format;
      return exhaustive;
    }
  }
}

function md5(bytes: Uint8Array): Uint8Array {
  return new Uint8Array(createHash('md5').update(bytes).digest());
}

function defaultHashTableSize(fileCount: number): number {
  let size = MIN_HASH_TABLE_SIZE;
  while (size < fileCount * 2) size *= 2;
  return size;
}

function fileKey(name: string, locale: number, platform: number): string {
  return `${foldName(name)}|${locale}|${platform}`;
}
