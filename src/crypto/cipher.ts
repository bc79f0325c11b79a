import { readUint32LE, writeUint32LE } from '../binary.js';
import { getCryptTable } from './cryptTable.js';
import { MpqHashType, baseName, hashName } from './hash.js';

const CIPHER_TABLE_OFFSET = 0x400;

/**
 * Decrypt `data` in place with the MPQ block cipher.
 *
 * Only whole little-endian words are transformed; a trailing 1-3 bytes stay as
 * they are, which is how every existing archive stores them.
 */
export function decryptBlock(data: Uint8Array, key: number): void {
  runCipher(data, key, false);
}

/** Encrypt `data` in place; the inverse of {@link decryptBlock} for the same key. */
export function encryptBlock(data: Uint8Array, key: number): void {
  runCipher(data, key, true);
}

function runCipher(data: Uint8Array, key: number, encrypting: boolean): void {
  const cryptTable = getCryptTable();
  const words = data.length >>> 2;
  let seed1 = key >>> 0;
  let seed2 = 0xeeeeeeee;
  for (let i = 0; i < words; i += 1) {
    const offset = i * 4;
    seed2 = (seed2 + cryptTable[CIPHER_TABLE_OFFSET + (seed1 & 0xff)]!) >>> 0;
    const input = readUint32LE(data, offset);
    const output = (input ^ ((seed1 + seed2) >>> 0)) >>> 0;
    const plain = encrypting ? input : output;
    seed1 = ((((~seed1 << 21) >>> 0) + 0x11111111) >>> 0 | (seed1 >>> 11)) >>> 0;
    seed2 = (plain + seed2 + ((seed2 << 5) >>> 0) + 3) >>> 0;
    writeUint32LE(data, offset, output);
  }
}

/** Key that encrypts a stored file: derived from its base name, optionally adjusted by position and size. */
export function deriveFileKey(
  name: string,
  filePosition: bigint,
  uncompressedSize: number,
  fixKey: boolean
): number {
  const key = hashName(baseName(name), MpqHashType.FileKey);
  if (!fixKey) return key;
  const low = Number(filePosition & 0xffffffffn);
  return (((key + low) >>> 0) ^ uncompressedSize) >>> 0;
}
