import { encodeUtf8 } from '../binary.js';
import { getCryptTable } from './cryptTable.js';

/** Selects which of the name hashes is computed. */
export const MpqHashType = {
  /** Start slot for hash table probing. */
  TableOffset: 0,
  /** First verification hash stored in the hash table. */
  NameA: 1,
  /** Second verification hash stored in the hash table. */
  NameB: 2,
  /** Encryption key for tables and file data. */
  FileKey: 3
} as const;

export type MpqHashType = (typeof MpqHashType)[keyof typeof MpqHashType];

const BACKSLASH = 0x5c;
const SLASH = 0x2f;

/** Hash an archive path. Case-insensitive for ASCII; `/` and `\` are equivalent. */
export function hashName(name: string, type: MpqHashType): number {
  const cryptTable = getCryptTable();
  const bytes = encodeUtf8(name);
  let seed1 = 0x7fed7fed;
  let seed2 = 0xeeeeeeee;
  for (let i = 0; i < bytes.length; i += 1) {
    const ch = normalizeByte(bytes[i]!);
    seed1 = (cryptTable[(type << 8) + ch]! ^ ((seed1 + seed2) >>> 0)) >>> 0;
    seed2 = (ch + seed1 + seed2 + ((seed2 << 5) >>> 0) + 3) >>> 0;
  }
  return seed1;
}

function normalizeByte(ch: number): number {
  if (ch === SLASH) return BACKSLASH;
  if (ch >= 0x61 && ch <= 0x7a) return ch - 0x20;
  return ch;
}

/** The spelling `hashName` sees: ASCII letters upper-cased and `/` as `\`. Equal folds hash alike. */
export function foldName(name: string): string {
  return name.replace(/[a-z/]/g, (ch) => (ch === '/' ? '\\' : ch.toUpperCase()));
}

/** Last path component, which is what file keys are derived from. */
export function baseName(name: string): string {
  const cut = Math.max(name.lastIndexOf('\\'), name.lastIndexOf('/'));
  return cut === -1 ? name : name.slice(cut + 1);
}

export const HASH_TABLE_KEY = hashName('(hash table)', MpqHashType.FileKey);
export const BLOCK_TABLE_KEY = hashName('(block table)', MpqHashType.FileKey);
