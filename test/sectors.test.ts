import test from 'node:test';
import assert from 'node:assert/strict';
import { CompressionError } from '../src/compression/errors.js';
import { encryptBlock } from '../src/crypto/cipher.js';
import { MpqError } from '../src/errors.js';
import { decodeFileData, encodeFileData, type SectorEncodeOptions } from '../src/sectors.js';
import { MpqFileFlags, type BlockEntry } from '../src/tables/blockTable.js';

const SECTOR_SIZE = 512;
const decoder = new TextDecoder();

function entryFor(bytes: Uint8Array, size: number, flags: number): BlockEntry {
  return { filePosition: 0n, compressedSize: bytes.length, uncompressedSize: size, flags: (MpqFileFlags.Exists | flags) >>> 0 };
}

function decode(bytes: Uint8Array, entry: BlockEntry, key?: number): Uint8Array {
  return decodeFileData(bytes, entry, { entryName: 'file.bin', sectorSize: SECTOR_SIZE, key });
}

function u32(values: number[]): Uint8Array {
  const out = new Uint8Array(values.length * 4);
  const view = new DataView(out.buffer);
  values.forEach((value, index) => view.setUint32(index * 4, value, true));
  return out;
}

function noise(length: number, seed: number): Uint8Array {
  const out = new Uint8Array(length);
  let state = seed >>> 0;
  for (let i = 0; i < length; i += 1) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    out[i] = state >>> 24;
  }
  return out;
}

function text(length: number): Uint8Array {
  const line = new TextEncoder().encode('sector line of text\n');
  const out = new Uint8Array(length);
  for (let i = 0; i < length; i += 1) out[i] = line[i % line.length]!;
  return out;
}

function errorOf(fn: () => unknown): MpqError {
  try {
    fn();
  } catch (err) {
    if (err instanceof MpqError) return err;
    throw err;
  }
  assert.fail('expected an MpqError');
}

const BASE: SectorEncodeOptions = {
  sectorSize: SECTOR_SIZE,
  compression: 'none',
  key: undefined,
  singleUnit: false,
  sectorCrc: false
};

test('compressed files start with a sector offset table', () => {
  const { bytes, flags } = encodeFileData(new Uint8Array(1024), { ...BASE, compression: 'sparse' });
  assert.equal(flags, MpqFileFlags.Compress);
  assert.equal(bytes.length, 30);
  const view = new DataView(bytes.buffer, bytes.byteOffset);
  assert.deepEqual([0, 4, 8].map((offset) => view.getUint32(offset, true)), [12, 21, 30]);
  assert.deepEqual([...bytes.subarray(12, 21)], [0x20, 0, 0, 2, 0, 0x7f, 0x7f, 0x7f, 0x77]);
  assert.deepEqual(decode(bytes, entryFor(bytes, 1024, flags)), new Uint8Array(1024));
});

test('sector checksums follow the last sector', () => {
  const { bytes, flags } = encodeFileData(new Uint8Array(1024), { ...BASE, compression: 'sparse', sectorCrc: true });
  assert.equal(flags, (MpqFileFlags.Compress | MpqFileFlags.SectorCrc) >>> 0);
  assert.equal(bytes.length, 42);
  const view = new DataView(bytes.buffer, bytes.byteOffset);
  assert.deepEqual([0, 4, 8, 12].map((offset) => view.getUint32(offset, true)), [16, 25, 34, 42]);
  assert.equal(view.getUint32(34, true), 0x061a0216);
  assert.equal(view.getUint32(38, true), 0x061a0216);
  assert.deepEqual(decode(bytes, entryFor(bytes, 1024, flags)), new Uint8Array(1024));
});

test('a checksum mismatch is a corrupt sector and a zero checksum is skipped', () => {
  const { bytes, flags } = encodeFileData(new Uint8Array(1024), { ...BASE, compression: 'sparse', sectorCrc: true });
  const view = new DataView(bytes.buffer, bytes.byteOffset);

  view.setUint32(34, 1, true);
  const err = errorOf(() => decode(bytes, entryFor(bytes, 1024, flags)));
  assert.equal(err.code, 'MPQ_CORRUPT_SECTOR');
  assert.equal(err.message, 'Sector 0 checksum mismatch');
  assert.equal(err.entryName, 'file.bin');
  assert.deepEqual(err.context, { sector: '0', expected: '0x1', actual: '0x61a0216' });

  view.setUint32(34, 0, true);
  assert.deepEqual(decode(bytes, entryFor(bytes, 1024, flags)), new Uint8Array(1024));
});

test('uncompressed files are stored sector by sector', () => {
  const data = text(1100);
  const plain = encodeFileData(data, BASE);
  assert.equal(plain.flags, 0);
  assert.deepEqual(plain.bytes, data);

  const encrypted = encodeFileData(data, { ...BASE, key: 0x1234 });
  assert.equal(encrypted.flags, MpqFileFlags.Encrypted);
  assert.equal(encrypted.bytes.length, 1100);
  assert.notDeepEqual(encrypted.bytes, data);
  assert.deepEqual(decode(encrypted.bytes, entryFor(encrypted.bytes, 1100, encrypted.flags), 0x1234), data);
});

test('sectors that do not shrink are stored raw inside a compressed file', () => {
  const data = noise(600, 7);
  const { bytes, flags } = encodeFileData(data, { ...BASE, compression: 'zlib' });
  assert.equal(flags, MpqFileFlags.Compress);
  assert.equal(bytes.length, 12 + 600);
  assert.deepEqual(bytes.subarray(12), data);
  assert.deepEqual(decode(bytes, entryFor(bytes, 600, flags)), data);
});

test('single-unit files decrypt and decompress as one block', () => {
  const data = text(700);
  const { bytes, flags } = encodeFileData(data, { ...BASE, compression: 'zlib', key: 0xdeadbeef, singleUnit: true });
  assert.equal(flags, (MpqFileFlags.Compress | MpqFileFlags.Encrypted | MpqFileFlags.SingleUnit) >>> 0);
  assert.ok(bytes.length < 700);
  assert.deepEqual(decode(bytes, entryFor(bytes, 700, flags), 0xdeadbeef), data);

  const wrongKey = errorOf(() => decode(bytes, entryFor(bytes, 700, flags), 0xdeadbeee));
  assert.ok(['MPQ_CORRUPT_SECTOR', 'MPQ_UNSUPPORTED_COMPRESSION'].includes(wrongKey.code));
});

test('every encrypted compressed layout decodes with the same key', () => {
  const data = text(2000);
  for (const compression of ['zlib', 'sparse', 'sparse+zlib'] as const) {
    for (const sectorCrc of [false, true]) {
      const { bytes, flags } = encodeFileData(data, { ...BASE, compression, sectorCrc, key: 0x0badf00d });
      assert.deepEqual(
        decode(bytes, entryFor(bytes, data.length, flags), 0x0badf00d),
        data,
        `${compression} crc=${sectorCrc}`
      );
    }
  }
});

test('empty files store nothing', () => {
  const { bytes, flags } = encodeFileData(new Uint8Array(0), { ...BASE, compression: 'zlib', key: 1 });
  assert.equal(bytes.length, 0);
  assert.equal(flags, (MpqFileFlags.Compress | MpqFileFlags.Encrypted) >>> 0);
  assert.equal(decode(bytes, entryFor(bytes, 0, flags), 1).length, 0);
});

test('imploded files decode with and without an offset table', () => {
  const stream = Uint8Array.from([0x00, 0x04, 0x82, 0x24, 0x25, 0x8f, 0x80, 0x7f]);
  const single = decode(stream, entryFor(stream, 13, MpqFileFlags.Implode | MpqFileFlags.SingleUnit));
  assert.equal(decoder.decode(single), 'AIAIAIAIAIAIA');

  const key = 0x5150;
  const table = u32([8, 16]);
  encryptBlock(table, key - 1);
  const sector = stream.slice();
  encryptBlock(sector, key);
  const stored = new Uint8Array(16);
  stored.set(table, 0);
  stored.set(sector, 8);
  const sectored = decode(stored, entryFor(stored, 13, MpqFileFlags.Implode | MpqFileFlags.Encrypted), key);
  assert.equal(decoder.decode(sectored), 'AIAIAIAIAIAIA');
});

test('truncated and malformed imploded files are corrupt', () => {
  for (const hex of ['00048224', '0007', '0204', '00']) {
    const stored = Uint8Array.from(Buffer.from(hex, 'hex'));
    const err = errorOf(() => decode(stored, entryFor(stored, 13, MpqFileFlags.Implode | MpqFileFlags.SingleUnit)));
    assert.equal(err.code, 'MPQ_CORRUPT_SECTOR', hex);
    assert.equal(err.entryName, 'file.bin');
  }
});

test('codec failures surface as MPQ errors with the codec error as cause', () => {
  const huffman = Uint8Array.from([0x01, 0xaa, 0xbb]);
  const unsupported = errorOf(() => decode(huffman, entryFor(huffman, 10, MpqFileFlags.Compress | MpqFileFlags.SingleUnit)));
  assert.equal(unsupported.code, 'MPQ_UNSUPPORTED_COMPRESSION');
  assert.equal(unsupported.entryName, 'file.bin');
  assert.ok(unsupported.cause instanceof CompressionError);
  assert.equal(unsupported.cause.code, 'COMPRESSION_UNSUPPORTED_ALGORITHM');

  const badZlib = Uint8Array.from([0x02, 1, 2, 3]);
  const corrupt = errorOf(() => decode(badZlib, entryFor(badZlib, 10, MpqFileFlags.Compress | MpqFileFlags.SingleUnit)));
  assert.equal(corrupt.code, 'MPQ_CORRUPT_SECTOR');
  assert.equal(corrupt.context?.algorithm, 'zlib');
  assert.ok(corrupt.cause instanceof CompressionError);
  assert.equal(corrupt.cause.code, 'COMPRESSION_ZLIB_BAD_DATA');
});

test('a sector that decodes to the wrong length is corrupt', () => {
  const stored = Uint8Array.from([0x20, 0, 0, 0, 5, 0x02]);
  const err = errorOf(() => decode(stored, entryFor(stored, 10, MpqFileFlags.Compress | MpqFileFlags.SingleUnit)));
  assert.equal(err.code, 'MPQ_CORRUPT_SECTOR');
  assert.equal(err.message, 'Sector 0 decoded to 5 bytes, expected 10');
});

test('offset tables must be ordered and in range', () => {
  const { bytes, flags } = encodeFileData(new Uint8Array(1024), { ...BASE, compression: 'sparse' });
  const entry = entryFor(bytes, 1024, flags);

  const backwards = bytes.slice();
  new DataView(backwards.buffer).setUint32(8, 20, true);
  const outOfOrder = errorOf(() => decode(backwards, entry));
  assert.equal(outOfOrder.code, 'MPQ_CORRUPT_SECTOR');
  assert.equal(outOfOrder.context?.index, '2');

  const past = bytes.slice();
  new DataView(past.buffer).setUint32(8, 31, true);
  assert.equal(errorOf(() => decode(past, entry)).context?.offset, '31');

  const tooSmall = { ...entry, compressedSize: 8 };
  assert.equal(errorOf(() => decode(bytes.subarray(0, 8), tooSmall)).message, 'Sector offset table does not fit in the file data');
});

test('stored data shorter than its block entry is rejected', () => {
  const { bytes, flags } = encodeFileData(new Uint8Array(1024), { ...BASE, compression: 'sparse' });
  const err = errorOf(() => decode(bytes.subarray(0, 20), entryFor(bytes, 1024, flags)));
  assert.equal(err.message, 'File data is truncated');

  const short = new Uint8Array(10);
  assert.equal(errorOf(() => decode(short, entryFor(short, 20, 0))).code, 'MPQ_CORRUPT_SECTOR');
});

test('decoding stops when the signal is aborted', () => {
  const controller = new AbortController();
  controller.abort();
  const data = text(1100);
  assert.throws(
    () =>
      decodeFileData(data, entryFor(data, 1100, 0), {
        entryName: 'file.bin',
        sectorSize: SECTOR_SIZE,
        key: undefined,
        signal: controller.signal
      }),
    { name: 'AbortError' }
  );
});
