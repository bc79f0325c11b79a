import test from 'node:test';
import assert from 'node:assert/strict';
import { CompressionError } from '../src/compression/errors.js';
import { MPQ_REPORT_SCHEMA_VERSION, MpqError } from '../src/errors.js';

test('MpqError serializes to a JSON report', () => {
  const cause = new Error('inner');
  const err = new MpqError('MPQ_CORRUPT_SECTOR', 'Sector 3 checksum mismatch', {
    entryName: 'units\\footman.mdx',
    offset: 0x1_0000_0010n,
    context: { sector: '3', expected: '0x1', actual: '0x2' },
    cause
  });
  assert.equal(err.name, 'MpqError');
  assert.equal(err.cause, cause);
  assert.ok(err instanceof Error);

  assert.deepEqual(err.toJSON(), {
    schemaVersion: '1',
    name: 'MpqError',
    code: 'MPQ_CORRUPT_SECTOR',
    message: 'Sector 3 checksum mismatch',
    hint: 'Sector 3 checksum mismatch',
    context: { sector: '3', expected: '0x1', actual: '0x2' },
    entryName: 'units\\footman.mdx',
    offset: '4294967312'
  });
  assert.equal(
    JSON.stringify(err),
    '{"schemaVersion":"1","name":"MpqError","code":"MPQ_CORRUPT_SECTOR","message":"Sector 3 checksum mismatch",' +
      '"hint":"Sector 3 checksum mismatch","context":{"sector":"3","expected":"0x1","actual":"0x2"},' +
      '"entryName":"units\\\\footman.mdx","offset":"4294967312"}'
  );
});

test('report context cannot shadow top-level fields', () => {
  const err = new MpqError('MPQ_NOT_FOUND', 'missing', {
    entryName: 'a.txt',
    context: { code: 'X', schemaVersion: '9', entryName: 'b.txt', offset: '12', locale: '0x407' }
  });
  const report = err.toJSON();
  assert.equal(report.schemaVersion, MPQ_REPORT_SCHEMA_VERSION);
  assert.equal(report.code, 'MPQ_NOT_FOUND');
  // offset is not set on the error, so the context may carry it
  assert.deepEqual(report.context, { offset: '12', locale: '0x407' });
  assert.equal(report.entryName, 'a.txt');
  assert.equal('offset' in report, false);
});

test('errors without optional fields serialize an empty context', () => {
  const report = new MpqError('MPQ_WRITER_CLOSED', 'Writer is closed').toJSON();
  assert.deepEqual(report, {
    schemaVersion: '1',
    name: 'MpqError',
    code: 'MPQ_WRITER_CLOSED',
    message: 'Writer is closed',
    hint: 'Writer is closed',
    context: {}
  });
});

test('CompressionError carries the codec name', () => {
  const err = new CompressionError('COMPRESSION_ZLIB_BAD_DATA', 'Invalid zlib stream', {
    algorithm: 'zlib',
    context: { algorithm: 'shadowed', capacity: '4096' }
  });
  assert.equal(err.name, 'CompressionError');
  assert.equal(err.algorithm, 'zlib');
  assert.deepEqual(err.toJSON(), {
    schemaVersion: '1',
    name: 'CompressionError',
    code: 'COMPRESSION_ZLIB_BAD_DATA',
    message: 'Invalid zlib stream',
    hint: 'Invalid zlib stream',
    context: { capacity: '4096' },
    algorithm: 'zlib'
  });
});
