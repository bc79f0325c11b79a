import test from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import { MpqError } from '../src/errors.js';
import {
  HEADER_SIZES,
  MPQ_HEADER_SIGNATURE,
  MpqFormat,
  createHeader,
  getArchiveSize,
  getBlockTableOffset,
  getHashTableOffset,
  getSectorSize,
  getStoredHashTableSize,
  isBlockTableCompressed,
  isHashTableCompressed,
  mergeHighBits,
  parseHeader,
  serializeHeader,
  splitHighBits,
  type MpqFormatVersion
} from '../src/header.js';

const FORMATS: MpqFormatVersion[] = [0, 1, 2, 3];

test('createHeader round-trips through serialize and parse for every format', () => {
  for (const format of FORMATS) {
    const header = createHeader(format);
    const bytes = serializeHeader(header);
    assert.equal(bytes.length, HEADER_SIZES[format]);
    assert.deepEqual(parseHeader(bytes), header);
  }
});

test('parses the reference header and serializes it back byte for byte', async () => {
  const fixture = await readFile(new URL('./fixtures/reference-v1.mpq', import.meta.url));
  const bytes = new Uint8Array(fixture).subarray(512, 512 + 44);
  const header = parseHeader(bytes);
  assert.equal(header.formatVersion, MpqFormat.ExtendedV1);
  assert.equal(header.headerSize, 44);
  assert.equal(header.archiveSize, 751);
  assert.equal(header.sectorSizeShift, 0);
  assert.equal(header.hashTableEntries, 16);
  assert.equal(header.blockTableEntries, 3);
  assert.equal(getHashTableOffset(header), 441n);
  assert.equal(getBlockTableOffset(header), 697n);
  assert.equal(getSectorSize(header), 512);
  assert.deepEqual(serializeHeader(header), bytes);
});

test('rejects a missing signature', () => {
  assert.throws(() => parseHeader(new Uint8Array(32)), (err: unknown) => {
    assert.ok(err instanceof MpqError);
    assert.equal(err.code, 'MPQ_BAD_SIGNATURE');
    return true;
  });
});

test('rejects unknown format versions', () => {
  const bytes = serializeHeader(createHeader(0));
  new DataView(bytes.buffer).setUint16(12, 4, true);
  assert.throws(() => parseHeader(bytes), (err: unknown) => {
    assert.ok(err instanceof MpqError);
    assert.equal(err.code, 'MPQ_UNSUPPORTED_FORMAT');
    assert.equal(err.context?.formatVersion, '4');
    return true;
  });
});

test('rejects headers cut short', () => {
  assert.throws(
    () => parseHeader(serializeHeader(createHeader(0)).subarray(0, 16)),
    (err: unknown) => err instanceof MpqError && err.code === 'MPQ_TRUNCATED_HEADER'
  );
  assert.throws(
    () => parseHeader(serializeHeader(createHeader(3)).subarray(0, HEADER_SIZES[2])),
    (err: unknown) => err instanceof MpqError && err.code === 'MPQ_TRUNCATED_HEADER'
  );
});

test('rejects a stored header size smaller than the version layout', () => {
  const bytes = serializeHeader({ ...createHeader(2), headerSize: 44 });
  assert.throws(() => parseHeader(bytes), (err: unknown) => {
    assert.ok(err instanceof MpqError);
    assert.equal(err.code, 'MPQ_BAD_HEADER');
    assert.equal(err.context?.required, '68');
    return true;
  });
});

test('keeps a larger stored header size verbatim', () => {
  const bytes = new Uint8Array(64);
  bytes.set(serializeHeader({ ...createHeader(1), headerSize: 64 }));
  const header = parseHeader(bytes);
  assert.equal(header.headerSize, 64);
  assert.equal(header.formatVersion, 1);
});

test('merges and splits 48-bit offsets', () => {
  assert.equal(mergeHighBits(0x89abcdef, 0x1234), 0x1234_89ab_cdefn);
  assert.deepEqual(splitHighBits(0x1234_89ab_cdefn), { baseBits: 0x89abcdef, highBits: 0x1234 });
  assert.equal(mergeHighBits(0x10, 0), 0x10n);
  // High bits past 16 are not part of the offset.
  assert.equal(mergeHighBits(0, 0x1_0000), 0n);
  assert.deepEqual(splitHighBits(0xffff_ffff_ffff_ffffn), { baseBits: 0xffffffff, highBits: 0xffff });
});

test('ExtendedV1 archive size is the furthest table end', () => {
  const base = {
    ...createHeader(1),
    hashTableOffset: 0x40,
    hashTableEntries: 16,
    blockTableOffset: 0x20,
    blockTableEntries: 32
  };
  // The block table starts first but ends last.
  assert.equal(getArchiveSize(base), 0x220n);
  assert.equal(getArchiveSize({ ...base, hiBlockTableOffset: 0x300n }), 0x340n);
});

test('ExtendedV1 tables sharing a start offset are sized by the longer one', () => {
  const base = {
    ...createHeader(1),
    hashTableOffset: 0x40,
    hashTableEntries: 4,
    blockTableOffset: 0x40,
    blockTableEntries: 9
  };
  assert.equal(getArchiveSize(base), 0xd0n);
  assert.equal(getArchiveSize({ ...base, hashTableEntries: 16 }), 0x140n);
});

test('Basic and ExtendedV2 archive sizes come from the stored fields', () => {
  assert.equal(getArchiveSize({ ...createHeader(0), archiveSize: 1234 }), 1234n);
  assert.equal(getArchiveSize({ ...createHeader(2), archiveSize: 1, archiveSize64: 0x1_0000_0000n }), 0x1_0000_0000n);
});

test('tables count as compressed only when their V3 size is non-zero and smaller', () => {
  const header = { ...createHeader(3), hashTableEntries: 16, blockTableEntries: 4 };
  assert.equal(isHashTableCompressed({ ...header, hashTableCompressedSize: 100n }), true);
  assert.equal(getStoredHashTableSize({ ...header, hashTableCompressedSize: 100n }), 100n);
  assert.equal(isHashTableCompressed({ ...header, hashTableCompressedSize: 256n }), false);
  assert.equal(getStoredHashTableSize({ ...header, hashTableCompressedSize: 256n }), 256n);
  assert.equal(isHashTableCompressed({ ...header, hashTableCompressedSize: 0n }), false);
  assert.equal(isBlockTableCompressed({ ...header, blockTableCompressedSize: 63n }), true);
  assert.equal(isBlockTableCompressed({ ...header, blockTableCompressedSize: 64n }), false);
  assert.equal(isHashTableCompressed({ ...createHeader(2), hashTableEntries: 16 }), false);
});

test('signature constant spells MPQ\\x1A', () => {
  const bytes = serializeHeader(createHeader(0));
  assert.deepEqual([...bytes.subarray(0, 4)], [0x4d, 0x50, 0x51, 0x1a]);
  assert.equal(new DataView(bytes.buffer).getUint32(0, true), MPQ_HEADER_SIGNATURE);
});
