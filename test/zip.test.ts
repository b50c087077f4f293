import test from 'node:test';
import assert from 'node:assert/strict';
import { ZipError } from '../src/errors.js';
import { readCentralDirectory, type ZipEntryRecord } from '../src/reader/centralDirectory.js';
import { readEntryData } from '../src/reader/entryData.js';
import { findEocd } from '../src/reader/eocd.js';
import { BufferRandomAccess } from '../src/reader/RandomAccess.js';
import { DEFAULT_READER_LIMITS } from '../src/limits.js';
import { buildZip, type FixtureEntry, type FixtureOptions } from './zipFixture.js';

const LIMITS = {
  maxSearchBytes: DEFAULT_READER_LIMITS.maxZipEocdSearchBytes,
  maxCentralDirectoryBytes: DEFAULT_READER_LIMITS.maxZipCentralDirectoryBytes,
  maxEntries: DEFAULT_READER_LIMITS.maxZipEntries
};

function open(entries: FixtureEntry[], options?: FixtureOptions) {
  const reader = new BufferRandomAccess(buildZip(entries, options));
  const eocd = findEocd(reader, LIMITS);
  const prefixBytes = eocd.zip64 ? 0 : eocd.eocdOffset - eocd.cdSize - eocd.cdOffset;
  const warnings: string[] = [];
  const records = readCentralDirectory(reader, {
    cdOffset: eocd.cdOffset,
    cdSize: eocd.cdSize,
    totalEntries: eocd.totalEntries,
    prefixBytes,
    onWarning: (warning) => warnings.push(warning.code)
  });
  return { reader, eocd, records, warnings };
}

function only(records: ZipEntryRecord[]): ZipEntryRecord {
  const [record] = records;
  assert.ok(record);
  return record;
}

const isZipError = (code: string) => (err: unknown) => err instanceof ZipError && err.code === code;

test('stored and deflated entries round-trip', () => {
  const { reader, records, eocd } = open([
    { name: 'a.txt', data: 'stored text' },
    { name: 'dir/b.txt', data: 'deflated '.repeat(50), method: 8 }
  ]);
  assert.equal(eocd.totalEntries, 2);
  assert.deepEqual(
    records.map((record) => record.name),
    ['a.txt', 'dir/b.txt']
  );
  const decoder = new TextDecoder();
  const [stored, deflated] = records;
  assert.ok(stored && deflated);
  assert.equal(decoder.decode(readEntryData(reader, stored, 1024)), 'stored text');
  assert.equal(decoder.decode(readEntryData(reader, deflated, 1024)), 'deflated '.repeat(50));
  assert.equal(deflated.method, 8);
  assert.ok(deflated.compressedSize < deflated.uncompressedSize);
});

test('an archive comment does not hide the end record', () => {
  const { reader, eocd, records } = open([{ name: 'a', data: 'x' }], { comment: 'hello' });
  assert.equal(eocd.warnings.length, 0);
  assert.equal(new TextDecoder().decode(readEntryData(reader, only(records), 1024)), 'x');
});

test('directory entries are flagged', () => {
  const { records } = open([{ name: 'dir/' }]);
  assert.equal(only(records).isDirectory, true);
});

test('names without the UTF-8 flag are read as code page 437', () => {
  const { records } = open([{ name: 'legacy', nameBytes: Uint8Array.of(0x63, 0x61, 0x66, 0x82), utf8: false, data: 'x' }]);
  assert.equal(only(records).name, 'café');
});

test('data prepended to the archive shifts entry offsets', () => {
  const { reader, records } = open([{ name: 'a.txt', data: 'after prefix' }], {
    prefix: new TextEncoder().encode('#!/bin/sh\nexit 0\n')
  });
  assert.equal(new TextDecoder().decode(readEntryData(reader, only(records), 1024)), 'after prefix');
});

test('ZIP64 end records and extra fields are understood', () => {
  const { reader, eocd, records } = open([{ name: 'big.txt', data: 'zip64 body', zip64Extra: true }], { zip64: true });
  assert.equal(eocd.zip64, true);
  const record = only(records);
  assert.equal(record.uncompressedSize, 10);
  assert.equal(new TextDecoder().decode(readEntryData(reader, record, 1024)), 'zip64 body');
});

test('a CRC mismatch is ZIP_BAD_CRC', () => {
  const { reader, records } = open([{ name: 'a', data: 'abc', crc: 1 }]);
  assert.throws(() => readEntryData(reader, only(records), 1024), isZipError('ZIP_BAD_CRC'));
});

test('unsupported methods and encryption are rejected', () => {
  const bzip = open([{ name: 'a', data: 'abc', method: 12 }]);
  assert.throws(() => readEntryData(bzip.reader, only(bzip.records), 1024), isZipError('ZIP_UNSUPPORTED_METHOD'));
  const encrypted = open([{ name: 'a', data: 'abc', encrypted: true }]);
  assert.throws(
    () => readEntryData(encrypted.reader, only(encrypted.records), 1024),
    isZipError('ZIP_UNSUPPORTED_ENCRYPTION')
  );
});

test('entries above the size limit are rejected before reading', () => {
  const { reader, records } = open([{ name: 'a', data: 'abcdef' }]);
  assert.throws(() => readEntryData(reader, only(records), 4), isZipError('ZIP_LIMIT_EXCEEDED'));
});

test('the entry count limit applies to the end record', () => {
  const reader = new BufferRandomAccess(buildZip([{ name: 'a' }, { name: 'b' }]));
  assert.throws(() => findEocd(reader, { ...LIMITS, maxEntries: 1 }), isZipError('ZIP_LIMIT_EXCEEDED'));
});

test('data without an end record is ZIP_EOCD_NOT_FOUND', () => {
  const reader = new BufferRandomAccess(new TextEncoder().encode('definitely not a zip archive'));
  assert.throws(() => findEocd(reader, LIMITS), isZipError('ZIP_EOCD_NOT_FOUND'));
  assert.throws(() => findEocd(new BufferRandomAccess(Uint8Array.of(1, 2)), LIMITS), isZipError('ZIP_EOCD_NOT_FOUND'));
});

test('a corrupt central directory is ZIP_BAD_CENTRAL_DIRECTORY', () => {
  const bytes = buildZip([{ name: 'a', data: 'abc' }]);
  const reader = new BufferRandomAccess(bytes);
  const eocd = findEocd(reader, LIMITS);
  bytes[eocd.cdOffset] = 0;
  assert.throws(
    () =>
      readCentralDirectory(reader, {
        cdOffset: eocd.cdOffset,
        cdSize: eocd.cdSize,
        totalEntries: eocd.totalEntries,
        prefixBytes: 0,
        onWarning: () => undefined
      }),
    isZipError('ZIP_BAD_CENTRAL_DIRECTORY')
  );
});
