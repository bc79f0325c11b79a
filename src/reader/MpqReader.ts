import { throwIfAborted } from '../abort.js';
import { readUint32LE } from '../binary.js';
import { CompressionError } from '../compression/errors.js';
import { decompressSector } from '../compression/sector.js';
import { decryptBlock, deriveFileKey } from '../crypto/cipher.js';
import { BLOCK_TABLE_KEY, HASH_TABLE_KEY, MpqHashType, hashName } from '../crypto/hash.js';
import { MpqError, type MpqErrorCode, type MpqWarning } from '../errors.js';
import {
  HEADER_SIZES,
  MPQ_HEADER_SIGNATURE,
  MPQ_USER_DATA_SIGNATURE,
  MpqFormat,
  getArchiveSize,
  getBlockTableOffset,
  getBlockTableSize,
  getHashTableOffset,
  getHashTableSize,
  getHiBlockTableSize,
  getSectorSize,
  getStoredBlockTableSize,
  getStoredHashTableSize,
  isBlockTableCompressed,
  isHashTableCompressed,
  parseHeader,
  type MpqHeader
} from '../header.js';
import { resolveProfile, type MpqProfile, type ResourceLimits } from '../limits.js';
import { FileRandomAccess } from '../node/RandomAccess.js';
import { decodeFileData } from '../sectors.js';
import { BlockTable, MpqFileFlags, hasFlag, isLiveBlock, type BlockEntry } from '../tables/blockTable.js';
import { HashTable, LOCALE_NEUTRAL, PLATFORM_DEFAULT } from '../tables/hashTable.js';
import { INTERNAL_FILE_NAMES, LISTFILE_NAME, parseListfile } from './listfile.js';
import { BufferRandomAccess, type RandomAccess } from './RandomAccess.js';

const HEADER_ALIGNMENT = 512n;
const USER_DATA_HEADER_SIZE = 16;
const MAX_HEADER_SIZE = HEADER_SIZES[MpqFormat.ExtendedV3];

export type MpqReaderOptions = {
  profile?: MpqProfile;
  isStrict?: boolean;
  limits?: ResourceLimits;
  signal?: AbortSignal;
};

export type MpqReadOptions = {
  locale?: number;
  platform?: number;
  signal?: AbortSignal;
};

/** One live hash table entry joined with its block. */
export type MpqEntry = {
  /** Known only when the name appears in `(listfile)` or is an internal file. */
  name?: string;
  hashIndex: number;
  blockIndex: number;
  locale: number;
  platform: number;
  filePosition: bigint;
  size: number;
  compressedSize: number;
  flags: number;
};

export class MpqReader {
  private readonly resolvedProfile: MpqProfile;
  private readonly strict: boolean;
  private readonly limits: Required<ResourceLimits>;
  private readonly signal: AbortSignal | undefined;
  private readonly warningsList: MpqWarning[] = [];
  private archiveOffsetValue = 0n;
  private headerValue: MpqHeader | undefined;
  private hashTable: HashTable | undefined;
  private blockTable: BlockTable | undefined;
  private listfilePromise: Promise<Map<string, string>> | undefined;

  private constructor(
    private readonly source: RandomAccess,
    options?: MpqReaderOptions
  ) {
    const resolved = resolveProfile(options);
    this.resolvedProfile = resolved.profile;
    this.strict = resolved.strict;
    this.limits = resolved.limits;
    this.signal = options?.signal;
  }

  static async fromUint8Array(data: Uint8Array, options?: MpqReaderOptions): Promise<MpqReader> {
    return MpqReader.fromRandomAccess(new BufferRandomAccess(data), options);
  }

  static async fromFile(pathLike: string | URL, options?: MpqReaderOptions): Promise<MpqReader> {
    const source = await FileRandomAccess.open(pathLike);
    try {
      return await MpqReader.fromRandomAccess(source, options);
    } catch (err) {
      await source.close();
      throw err;
    }
  }

  static async fromRandomAccess(source: RandomAccess, options?: MpqReaderOptions): Promise<MpqReader> {
    const instance = new MpqReader(source, options);
    await instance.init();
    return instance;
  }

  get header(): MpqHeader {
    return this.requireOpen().header;
  }

  /** Offset of the MPQ header within the source; table and file offsets are relative to it. */
  get archiveOffset(): bigint {
    return this.archiveOffsetValue;
  }

  get profile(): MpqProfile {
    return this.resolvedProfile;
  }

  warnings(): MpqWarning[] {
    return [...this.warningsList];
  }

  /** Whether a readable file is stored under `name` for `locale`. */
  fileExists(name: string, locale: number = LOCALE_NEUTRAL): boolean {
    const { hashTable, blockTable } = this.requireOpen();
    const blockIndex = hashTable.lookup({ name, locale });
    if (blockIndex === undefined) return false;
    const entry = blockTable.at(blockIndex);
    return entry !== undefined && isLiveBlock(entry);
  }

  /** Contents of the file stored under `name`, as a freshly allocated array. */
  async readFile(name: string, options?: MpqReadOptions): Promise<Uint8Array> {
    const { header, hashTable, blockTable } = this.requireOpen();
    const signal = options?.signal ?? this.signal;
    throwIfAborted(signal);
    const blockIndex = hashTable.require({
      name,
      locale: options?.locale ?? LOCALE_NEUTRAL,
      platform: options?.platform ?? PLATFORM_DEFAULT
    });
    const entry = withEntryName(name, () => blockTable.resolve(blockIndex));
    if (hasFlag(entry, MpqFileFlags.PatchFile)) {
      throw new MpqError('MPQ_UNSUPPORTED_FEATURE', `Patch files are not supported: ${name}`, {
        entryName: name,
        context: { flags: `0x${entry.flags.toString(16)}` }
      });
    }
    this.enforceFileLimits(name, entry);

    const position = this.archiveOffsetValue + entry.filePosition;
    const stored = await this.source.read(position, entry.compressedSize, signal);
    const key = hasFlag(entry, MpqFileFlags.Encrypted)
      ? deriveFileKey(name, entry.filePosition, entry.uncompressedSize, hasFlag(entry, MpqFileFlags.FixKey))
      : undefined;
    try {
      return decodeFileData(stored, entry, {
        entryName: name,
        sectorSize: getSectorSize(header),
        key,
        signal
      });
    } catch (err) {
      if (err instanceof MpqError && err.offset === undefined) {
        throw new MpqError(err.code, err.message, {
          entryName: err.entryName ?? name,
          offset: position,
          context: err.context,
          cause: err.cause
        });
      }
      throw err;
    }
  }

  /**
   * Every live hash table entry that points at a readable block, in hash
   * table order. Names come from `(listfile)` when the archive has one.
   */
  async listEntries(): Promise<MpqEntry[]> {
    const { hashTable, blockTable } = this.requireOpen();
    const names = await this.loadNames();
    const entries: MpqEntry[] = [];
    for (const slot of hashTable.entries()) {
      const block = blockTable.at(slot.blockIndex);
      if (!block || !isLiveBlock(block)) continue;
      const name = names.get(nameKey(slot.nameHashA, slot.nameHashB));
      entries.push({
        ...(name !== undefined ? { name } : {}),
        hashIndex: slot.index,
        blockIndex: slot.blockIndex,
        locale: slot.locale,
        platform: slot.platform,
        filePosition: block.filePosition,
        size: block.uncompressedSize,
        compressedSize: block.compressedSize,
        flags: block.flags
      });
    }
    return entries;
  }

  async close(): Promise<void> {
    await this.source.close();
  }

  private async init(): Promise<void> {
    const signal = this.signal;
    const sourceSize = await this.source.size(signal);
    this.archiveOffsetValue = await this.locateHeader(sourceSize);
    const headerBytes = await this.source.read(this.archiveOffsetValue, MAX_HEADER_SIZE, signal);
    const header = parseHeader(headerBytes);
    this.headerValue = header;

    if (header.headerSize !== HEADER_SIZES[header.formatVersion]) {
      this.warn({
        code: 'MPQ_HEADER_SIZE_MISMATCH',
        message: `Header size ${header.headerSize} differs from ${HEADER_SIZES[header.formatVersion]} for format ${header.formatVersion}`
      });
    }
    this.enforceTableLimits(header);

    const declaredSize = getArchiveSize(header);
    const availableSize = sourceSize - this.archiveOffsetValue;
    if (declaredSize > availableSize) {
      this.warn({
        code: 'MPQ_ARCHIVE_SIZE_MISMATCH',
        message: `Archive declares ${declaredSize} bytes but only ${availableSize} are available`
      });
    }

    const hashBytes = await this.readTable({
      label: 'Hash table',
      offset: getHashTableOffset(header),
      storedSize: getStoredHashTableSize(header),
      rawSize: getHashTableSize(header),
      compressed: isHashTableCompressed(header),
      key: HASH_TABLE_KEY,
      badCode: 'MPQ_BAD_HASH_TABLE'
    });
    this.hashTable = HashTable.decode(hashBytes, header.hashTableEntries);

    const blockBytes = await this.readTable({
      label: 'Block table',
      offset: getBlockTableOffset(header),
      storedSize: getStoredBlockTableSize(header),
      rawSize: getBlockTableSize(header),
      compressed: isBlockTableCompressed(header),
      key: BLOCK_TABLE_KEY,
      badCode: 'MPQ_BAD_BLOCK_TABLE'
    });
    const hiBlockBytes = await this.readHiBlockTable(header);
    this.blockTable = BlockTable.decode(blockBytes, header.blockTableEntries, hiBlockBytes);

    for (const slot of this.hashTable.entries()) {
      if (slot.blockIndex >= this.blockTable.size) {
        this.warn({
          code: 'MPQ_DANGLING_HASH_ENTRY',
          message: `Hash slot ${slot.index} points at block ${slot.blockIndex} past the block table`
        });
      }
    }
  }

  /** Search 512-byte boundaries for a header or a user-data block that points at one. */
  private async locateHeader(sourceSize: bigint): Promise<bigint> {
    const searchEnd = minBigInt(sourceSize, BigInt(this.limits.maxHeaderSearchBytes));
    for (let offset = 0n; offset < searchEnd; offset += HEADER_ALIGNMENT) {
      throwIfAborted(this.signal);
      const candidate = await this.source.read(offset, USER_DATA_HEADER_SIZE, this.signal);
      if (candidate.length < 4) break;
      const signature = readUint32LE(candidate, 0);
      if (signature === MPQ_HEADER_SIGNATURE) return offset;
      if (signature === MPQ_USER_DATA_SIGNATURE && candidate.length >= 12) {
        const target = offset + BigInt(readUint32LE(candidate, 8));
        const redirected = await this.source.read(target, 4, this.signal);
        if (redirected.length === 4 && readUint32LE(redirected, 0) === MPQ_HEADER_SIGNATURE) return target;
      }
    }
    throw new MpqError('MPQ_BAD_SIGNATURE', 'No MPQ header found', {
      context: { searchedBytes: searchEnd.toString() }
    });
  }

  private async readTable(spec: {
    label: string;
    offset: bigint;
    storedSize: bigint;
    rawSize: bigint;
    compressed: boolean;
    key: number;
    badCode: MpqErrorCode;
  }): Promise<Uint8Array> {
    const position = this.archiveOffsetValue + spec.offset;
    const storedSize = Number(spec.storedSize);
    const stored = await this.source.read(position, storedSize, this.signal);
    if (stored.length < storedSize) {
      throw new MpqError('MPQ_TRUNCATED_TABLE', `${spec.label} extends past the end of the archive`, {
        offset: position,
        context: { available: String(stored.length), required: String(storedSize) }
      });
    }
    const table = stored.slice();
    decryptBlock(table, spec.key);
    if (!spec.compressed) return table;
    try {
      return decompressSector(table, Number(spec.rawSize));
    } catch (err) {
      if (!(err instanceof CompressionError)) throw err;
      throw new MpqError(spec.badCode, `${spec.label} could not be decompressed`, {
        offset: position,
        context: { storedSize: String(storedSize), rawSize: spec.rawSize.toString() },
        cause: err
      });
    }
  }

  private async readHiBlockTable(header: MpqHeader): Promise<Uint8Array | undefined> {
    if (header.formatVersion === MpqFormat.Basic || header.hiBlockTableOffset === 0n) return undefined;
    const rawSize = getHiBlockTableSize(header);
    const compressed =
      header.formatVersion === MpqFormat.ExtendedV3 &&
      header.hiBlockTableCompressedSize !== 0n &&
      header.hiBlockTableCompressedSize < rawSize;
    const storedSize = compressed && header.formatVersion === MpqFormat.ExtendedV3
      ? header.hiBlockTableCompressedSize
      : rawSize;
    const position = this.archiveOffsetValue + header.hiBlockTableOffset;
    const stored = await this.source.read(position, Number(storedSize), this.signal);
    if (stored.length < Number(storedSize)) {
      throw new MpqError('MPQ_TRUNCATED_TABLE', 'Hi-block table extends past the end of the archive', {
        offset: position,
        context: { available: String(stored.length), required: storedSize.toString() }
      });
    }
    if (!compressed) return stored.slice();
    try {
      return decompressSector(stored, Number(rawSize));
    } catch (err) {
      if (!(err instanceof CompressionError)) throw err;
      throw new MpqError('MPQ_BAD_BLOCK_TABLE', 'Hi-block table could not be decompressed', {
        offset: position,
        cause: err
      });
    }
  }

  private enforceTableLimits(header: MpqHeader): void {
    const checks: Array<[string, number, number]> = [
      ['hashTableEntries', header.hashTableEntries, this.limits.maxHashTableEntries],
      ['blockTableEntries', header.blockTableEntries, this.limits.maxBlockTableEntries],
      ['sectorSizeShift', header.sectorSizeShift, this.limits.maxSectorSizeShift]
    ];
    for (const [field, value, limit] of checks) {
      if (value > limit) {
        throw new MpqError('MPQ_LIMIT_EXCEEDED', `${field} ${value} exceeds the limit of ${limit}`, {
          context: { field, value: String(value), limit: String(limit) }
        });
      }
    }
  }

  private enforceFileLimits(name: string, entry: BlockEntry): void {
    if (entry.uncompressedSize > this.limits.maxFileBytes) {
      throw new MpqError('MPQ_LIMIT_EXCEEDED', `${name} is larger than maxFileBytes`, {
        entryName: name,
        context: { size: String(entry.uncompressedSize), limit: String(this.limits.maxFileBytes) }
      });
    }
    const compressed = hasFlag(entry, MpqFileFlags.Compress) || hasFlag(entry, MpqFileFlags.Implode);
    if (compressed && entry.uncompressedSize > Math.max(1, entry.compressedSize) * this.limits.maxCompressionRatio) {
      throw new MpqError('MPQ_LIMIT_EXCEEDED', `${name} exceeds maxCompressionRatio`, {
        entryName: name,
        context: {
          compressedSize: String(entry.compressedSize),
          uncompressedSize: String(entry.uncompressedSize),
          limit: String(this.limits.maxCompressionRatio)
        }
      });
    }
  }

  private loadNames(): Promise<Map<string, string>> {
    this.listfilePromise ??= this.readNames();
    return this.listfilePromise;
  }

  private async readNames(): Promise<Map<string, string>> {
    const names = new Map<string, string>();
    const add = (name: string) => {
      const key = nameKey(hashName(name, MpqHashType.NameA), hashName(name, MpqHashType.NameB));
      if (!names.has(key)) names.set(key, name);
    };
    INTERNAL_FILE_NAMES.forEach(add);
    if (!this.fileExists(LISTFILE_NAME)) return names;
    try {
      parseListfile(await this.readFile(LISTFILE_NAME)).forEach(add);
    } catch (err) {
      if (!(err instanceof MpqError)) throw err;
      this.warn({
        code: 'MPQ_LISTFILE_UNREADABLE',
        message: `${LISTFILE_NAME} could not be read: ${err.message}`,
        entryName: LISTFILE_NAME
      }, err);
    }
    return names;
  }

  /** Record a warning, or throw it as an error under the strict profile. */
  private warn(warning: MpqWarning, cause?: MpqError): void {
    if (this.strict) {
      if (cause) throw cause;
      throw new MpqError(strictErrorCode(warning), warning.message, {
        entryName: warning.entryName,
        context: { warning: warning.code }
      });
    }
    this.warningsList.push(warning);
  }

  private requireOpen(): { header: MpqHeader; hashTable: HashTable; blockTable: BlockTable } {
    if (!this.headerValue || !this.hashTable || !this.blockTable) {
      throw new MpqError('MPQ_BAD_HEADER', 'Archive has not been opened');
    }
    return { header: this.headerValue, hashTable: this.hashTable, blockTable: this.blockTable };
  }
}

function strictErrorCode(warning: MpqWarning): MpqErrorCode {
  switch (warning.code) {
    case 'MPQ_ARCHIVE_SIZE_MISMATCH':
    case 'MPQ_HEADER_SIZE_MISMATCH':
      return 'MPQ_BAD_HEADER';
    case 'MPQ_DANGLING_HASH_ENTRY':
      return 'MPQ_BAD_HASH_TABLE';
    case 'MPQ_LISTFILE_UNREADABLE':
      return 'MPQ_CORRUPT_SECTOR';
    default: {
      const exhaustive: never = warning.code;
      return exhaustive;
    }
  }
}

function withEntryName<T>(name: string, resolve: () => T): T {
  try {
    return resolve();
  } catch (err) {
    if (err instanceof MpqError && err.entryName === undefined) {
      throw new MpqError(err.code, err.message, { entryName: name, context: err.context, cause: err.cause });
    }
    throw err;
  }
}

function nameKey(nameHashA: number, nameHashB: number): string {
  return `${nameHashA}:${nameHashB}`;
}

function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
