import { readUint16LE, readUint32LE, writeUint16LE, writeUint32LE } from '../binary.js';
import { MpqHashType, hashName } from '../crypto/hash.js';
import { MpqError } from '../errors.js';
import { HASH_ENTRY_SIZE } from '../header.js';

/** Block index value of a slot that has never held an entry. Probing stops here. */
export const HASH_ENTRY_EMPTY = 0xffffffff;
/** Block index value of a slot whose entry was removed. Probing continues past it. */
export const HASH_ENTRY_DELETED = 0xfffffffe;

/** Locale id of files that are not localized. */
export const LOCALE_NEUTRAL = 0;
export const PLATFORM_DEFAULT = 0;

export type LiveHashSlot = {
  readonly kind: 'live';
  readonly nameHashA: number;
  readonly nameHashB: number;
  readonly locale: number;
  readonly platform: number;
  readonly blockIndex: number;
};

export type HashSlot = LiveHashSlot | { readonly kind: 'deleted' } | { readonly kind: 'empty' };

const EMPTY_SLOT: HashSlot = Object.freeze({ kind: 'empty' });
const DELETED_SLOT: HashSlot = Object.freeze({ kind: 'deleted' });

export type HashKey = {
  name: string;
  locale?: number;
  platform?: number;
};

/** Open-addressed name → block index table with linear probing. */
export class HashTable {
  private readonly slots: HashSlot[];
  private readonly mask: number;

  constructor(readonly entryCount: number) {
    if (!isPowerOfTwo(entryCount)) {
      throw new MpqError('MPQ_BAD_HASH_TABLE', `Hash table size ${entryCount} is not a power of two`, {
        context: { entryCount: String(entryCount) }
      });
    }
    this.slots = new Array<HashSlot>(entryCount).fill(EMPTY_SLOT);
    this.mask = entryCount - 1;
  }

  /** Decode a decrypted hash table. */
  static decode(bytes: Uint8Array, entryCount: number): HashTable {
    const table = new HashTable(entryCount);
    if (bytes.length < entryCount * HASH_ENTRY_SIZE) {
      throw new MpqError('MPQ_TRUNCATED_TABLE', 'Hash table is shorter than its entry count', {
        context: { available: String(bytes.length), required: String(entryCount * HASH_ENTRY_SIZE) }
      });
    }
    for (let i = 0; i < entryCount; i += 1) {
      table.slots[i] = decodeSlot(bytes, i * HASH_ENTRY_SIZE);
    }
    return table;
  }

  /** Encode to the unencrypted on-disk layout. */
  encode(): Uint8Array {
    const out = new Uint8Array(this.entryCount * HASH_ENTRY_SIZE);
    this.slots.forEach((slot, index) => encodeSlot(out, index * HASH_ENTRY_SIZE, slot));
    return out;
  }

  slot(index: number): HashSlot {
    return this.slots[index] ?? EMPTY_SLOT;
  }

  /** Block index of the entry for `key`, or `undefined` when it is not present. */
  lookup(key: HashKey): number | undefined {
    const found = this.findLive(key);
    return found === undefined ? undefined : found.slot.blockIndex;
  }

  /** Like {@link lookup}, but throws `MPQ_NOT_FOUND`. */
  require(key: HashKey): number {
    const blockIndex = this.lookup(key);
    if (blockIndex === undefined) {
      throw new MpqError('MPQ_NOT_FOUND', `File not found: ${key.name}`, {
        entryName: key.name,
        context: { locale: String(key.locale ?? LOCALE_NEUTRAL) }
      });
    }
    return blockIndex;
  }

  /** Insert an entry, reusing the first deleted or never-used slot on its collision path. */
  insert(key: HashKey, blockIndex: number): number {
    const hashes = hashKey(key);
    let target: number | undefined;
    for (const index of this.slotsFrom(hashes.start)) {
      const slot = this.slots[index]!;
      if (slot.kind === 'live') {
        if (matches(slot, hashes)) {
          throw new MpqError('MPQ_DUPLICATE_ENTRY', `Duplicate entry: ${key.name}`, {
            entryName: key.name,
            context: { locale: String(hashes.locale), platform: String(hashes.platform) }
          });
        }
        continue;
      }
      target ??= index;
      if (slot.kind === 'empty') break;
    }
    if (target === undefined) {
      throw new MpqError('MPQ_HASH_TABLE_FULL', `No free hash table slot for ${key.name}`, {
        entryName: key.name,
        context: { entryCount: String(this.entryCount) }
      });
    }
    this.slots[target] = {
      kind: 'live',
      nameHashA: hashes.nameHashA,
      nameHashB: hashes.nameHashB,
      locale: hashes.locale,
      platform: hashes.platform,
      blockIndex: blockIndex >>> 0
    };
    return target;
  }

  /** Mark the entry for `key` deleted. Returns whether one was found. */
  remove(key: HashKey): boolean {
    const found = this.findLive(key);
    if (found === undefined) return false;
    this.slots[found.index] = DELETED_SLOT;
    return true;
  }

  /** Live slots in table order. */
  *entries(): IterableIterator<LiveHashSlot & { index: number }> {
    for (let index = 0; index < this.entryCount; index += 1) {
      const slot = this.slots[index]!;
      if (slot.kind === 'live') yield { ...slot, index };
    }
  }

  private findLive(key: HashKey): { index: number; slot: LiveHashSlot } | undefined {
    const hashes = hashKey(key);
    for (const index of this.slotsFrom(hashes.start)) {
      const slot = this.slots[index]!;
      if (slot.kind === 'empty') return undefined;
      if (slot.kind === 'live' && matches(slot, hashes)) return { index, slot };
    }
    return undefined;
  }

  private *slotsFrom(start: number): IterableIterator<number> {
    for (let step = 0; step < this.entryCount; step += 1) {
      yield (start + step) & this.mask;
    }
  }
}

type KeyHashes = {
  start: number;
  nameHashA: number;
  nameHashB: number;
  locale: number;
  platform: number;
};

function hashKey(key: HashKey): KeyHashes {
  return {
    start: hashName(key.name, MpqHashType.TableOffset),
    nameHashA: hashName(key.name, MpqHashType.NameA),
    nameHashB: hashName(key.name, MpqHashType.NameB),
    locale: key.locale ?? LOCALE_NEUTRAL,
    platform: key.platform ?? PLATFORM_DEFAULT
  };
}

function matches(slot: LiveHashSlot, hashes: KeyHashes): boolean {
  return (
    slot.nameHashA === hashes.nameHashA &&
    slot.nameHashB === hashes.nameHashB &&
    slot.locale === hashes.locale &&
    slot.platform === hashes.platform
  );
}

function decodeSlot(bytes: Uint8Array, offset: number): HashSlot {
  const blockIndex = readUint32LE(bytes, offset + 12);
  if (blockIndex === HASH_ENTRY_EMPTY) return EMPTY_SLOT;
  if (blockIndex === HASH_ENTRY_DELETED) return DELETED_SLOT;
  return {
    kind: 'live',
    nameHashA: readUint32LE(bytes, offset),
    nameHashB: readUint32LE(bytes, offset + 4),
    locale: readUint16LE(bytes, offset + 8),
    platform: readUint16LE(bytes, offset + 10),
    blockIndex
  };
}

function encodeSlot(out: Uint8Array, offset: number, slot: HashSlot): void {
  switch (slot.kind) {
    case 'live':
      writeUint32LE(out, offset, slot.nameHashA);
      writeUint32LE(out, offset + 4, slot.nameHashB);
      writeUint16LE(out, offset + 8, slot.locale);
      writeUint16LE(out, offset + 10, slot.platform);
      writeUint32LE(out, offset + 12, slot.blockIndex);
      return;
    case 'deleted':
    case 'empty':
      writeUint32LE(out, offset, 0xffffffff);
      writeUint32LE(out, offset + 4, 0xffffffff);
      writeUint16LE(out, offset + 8, 0xffff);
      writeUint16LE(out, offset + 10, 0xffff);
      writeUint32LE(out, offset + 12, slot.kind === 'empty' ? HASH_ENTRY_EMPTY : HASH_ENTRY_DELETED);
      return;
    default: {
      const exhaustive: never = slot;
      return exhaustive;
    }
  }
}

function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 0 && value <= 0x80000000 && (value & (value - 1)) === 0;
}
