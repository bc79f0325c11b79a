import { readUint16LE, readUint32LE, writeUint16LE, writeUint32LE } from '../binary.js';
import { MpqError } from '../errors.js';
import { BLOCK_ENTRY_SIZE, HI_BLOCK_ENTRY_SIZE } from '../header.js';

/** Block flag bits. */
export const MpqFileFlags = {
  /** Whole file compressed with PKWARE implode, no per-sector mask byte. */
  Implode: 0x00000100,
  /** Sectors carry a leading compression mask byte. */
  Compress: 0x00000200,
  Encrypted: 0x00010000,
  /** File key is adjusted by the file position and size. */
  FixKey: 0x00020000,
  PatchFile: 0x00100000,
  /** Stored as one unit rather than in sectors. */
  SingleUnit: 0x01000000,
  DeleteMarker: 0x02000000,
  /** An Adler-32 checksum block follows the last sector. */
  SectorCrc: 0x04000000,
  Exists: 0x80000000
} as const;

export type BlockEntry = {
  /** Offset of the file data from the archive start (48 bits once the hi-block table is merged). */
  readonly filePosition: bigint;
  readonly compressedSize: number;
  readonly uncompressedSize: number;
  readonly flags: number;
};

export function hasFlag(entry: BlockEntry, flag: number): boolean {
  return ((entry.flags & flag) >>> 0) === flag >>> 0;
}

/** Whether the entry names stored data a reader may return. */
export function isLiveBlock(entry: BlockEntry): boolean {
  return hasFlag(entry, MpqFileFlags.Exists) && !hasFlag(entry, MpqFileFlags.DeleteMarker);
}

export class BlockTable {
  private constructor(private readonly entriesList: readonly BlockEntry[]) {}

  static from(entries: readonly BlockEntry[]): BlockTable {
    return new BlockTable([...entries]);
  }

  /**
   * Decode a decrypted block table, merging the upper 16 bits of each file
   * position from the hi-block table when one is present.
   */
  static decode(bytes: Uint8Array, entryCount: number, hiBlockTable?: Uint8Array): BlockTable {
    if (bytes.length < entryCount * BLOCK_ENTRY_SIZE) {
      throw new MpqError('MPQ_TRUNCATED_TABLE', 'Block table is shorter than its entry count', {
        context: { available: String(bytes.length), required: String(entryCount * BLOCK_ENTRY_SIZE) }
      });
    }
    if (hiBlockTable && hiBlockTable.length < entryCount * HI_BLOCK_ENTRY_SIZE) {
      throw new MpqError('MPQ_TRUNCATED_TABLE', 'Hi-block table is shorter than the block table', {
        context: {
          available: String(hiBlockTable.length),
          required: String(entryCount * HI_BLOCK_ENTRY_SIZE)
        }
      });
    }
    const entries: BlockEntry[] = [];
    for (let i = 0; i < entryCount; i += 1) {
      const offset = i * BLOCK_ENTRY_SIZE;
      const high = hiBlockTable ? readUint16LE(hiBlockTable, i * HI_BLOCK_ENTRY_SIZE) : 0;
      entries.push({
        filePosition: (BigInt(high) << 32n) | BigInt(readUint32LE(bytes, offset)),
        compressedSize: readUint32LE(bytes, offset + 4),
        uncompressedSize: readUint32LE(bytes, offset + 8),
        flags: readUint32LE(bytes, offset + 12)
      });
    }
    return new BlockTable(entries);
  }

  get size(): number {
    return this.entriesList.length;
  }

  /** Descriptor at `index`, even when it is not live. */
  at(index: number): BlockEntry | undefined {
    return this.entriesList[index];
  }

  /** Descriptor at `index`; throws for an index past the table or an entry that does not exist. */
  resolve(index: number): BlockEntry {
    const entry = this.entriesList[index];
    if (entry === undefined) {
      throw new MpqError('MPQ_BLOCK_OUT_OF_RANGE', `Block index ${index} is outside the block table`, {
        context: { index: String(index), blockTableEntries: String(this.entriesList.length) }
      });
    }
    if (!isLiveBlock(entry)) {
      throw new MpqError('MPQ_BLOCK_DELETED', `Block ${index} does not hold a file`, {
        context: { index: String(index), flags: `0x${entry.flags.toString(16)}` }
      });
    }
    return entry;
  }

  entries(): readonly BlockEntry[] {
    return this.entriesList;
  }

  /** Encode the unencrypted block table (low 32 bits of each position). */
  encode(): Uint8Array {
    const out = new Uint8Array(this.entriesList.length * BLOCK_ENTRY_SIZE);
    this.entriesList.forEach((entry, i) => {
      const offset = i * BLOCK_ENTRY_SIZE;
      writeUint32LE(out, offset, Number(entry.filePosition & 0xffffffffn));
      writeUint32LE(out, offset + 4, entry.compressedSize);
      writeUint32LE(out, offset + 8, entry.uncompressedSize);
      writeUint32LE(out, offset + 12, entry.flags);
    });
    return out;
  }

  /** Encode the hi-block table (bits 32-47 of each position). */
  encodeHighBits(): Uint8Array {
    const out = new Uint8Array(this.entriesList.length * HI_BLOCK_ENTRY_SIZE);
    this.entriesList.forEach((entry, i) => {
      writeUint16LE(out, i * HI_BLOCK_ENTRY_SIZE, Number((entry.filePosition >> 32n) & 0xffffn));
    });
    return out;
  }
}
