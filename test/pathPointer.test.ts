import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { gzipSync } from 'node:zlib';
import { OpenOnDemandArchive } from '../src/archive/OpenOnDemandArchive.js';
import { ZipError } from '../src/errors.js';
import { ResourceError } from '../src/resource/errors.js';
import {
  FileSystemPathPointer,
  GzipFileSystemPathPointer,
  ZipEntryPathPointer
} from '../src/resource/PathPointer.js';
import { buildZip, makeTempDir, writeFixture } from './zipFixture.js';

const decode = (data: Uint8Array): string => new TextDecoder().decode(data);

test('FileSystemPathPointer requires an existing path', () => {
  const { dir, cleanup } = makeTempDir();
  try {
    assert.throws(
      () => new FileSystemPathPointer(path.join(dir, 'missing.txt')),
      (err: unknown) => err instanceof ResourceError && err.code === 'RESOURCE_PATH_NOT_FOUND'
    );
  } finally {
    cleanup();
  }
});

test('FileSystemPathPointer opens bytes or text', () => {
  const { dir, cleanup } = makeTempDir();
  try {
    const file = writeFixture(dir, 'corpora/a.txt', 'héllo\nworld\n');
    const pointer = new FileSystemPathPointer(file);
    assert.equal(pointer.toString(), file);
    assert.equal(pointer.describe(), `FileSystemPathPointer(${JSON.stringify(file)})`);
    assert.equal(pointer.fileSize(), 13);

    const bytes = pointer.open();
    assert.equal(decode(bytes.read()), 'héllo\nworld\n');
    bytes.close();

    const reader = pointer.open('utf-8');
    assert.equal(reader.readline(), 'héllo\n');
    reader.close();
    assert.equal(reader.closed, true);

    const joined = new FileSystemPathPointer(dir).join('corpora/a.txt');
    assert.equal(joined.toString(), file);
  } finally {
    cleanup();
  }
});

test('an unknown encoding fails before a reader exists', () => {
  const { dir, cleanup } = makeTempDir();
  try {
    const pointer = new FileSystemPathPointer(writeFixture(dir, 'a.txt', 'x'));
    assert.throws(
      () => pointer.open('no-such-codec'),
      (err: unknown) => err instanceof ResourceError && err.code === 'RESOURCE_UNKNOWN_ENCODING'
    );
  } finally {
    cleanup();
  }
});

test('GzipFileSystemPathPointer yields decompressed bytes', () => {
  const { dir, cleanup } = makeTempDir();
  try {
    const compressed = gzipSync(Buffer.from('line one\nline two\n'));
    const file = writeFixture(dir, 'data.txt.gz', compressed);
    const pointer = new GzipFileSystemPathPointer(file);
    assert.equal(pointer.fileSize(), compressed.length);
    assert.equal(decode(pointer.open().read()), 'line one\nline two\n');
    const reader = pointer.open('utf-8');
    assert.deepEqual(reader.readlines(), ['line one\n', 'line two\n']);
    assert.match(pointer.describe(), /^GzipFileSystemPathPointer\(/);
  } finally {
    cleanup();
  }
});

test('ZipEntryPathPointer validates entries against the listing', () => {
  const { dir, cleanup } = makeTempDir();
  try {
    const zipPath = writeFixture(dir, 'pkg.zip', buildZip([{ name: 'corpora/x/y.txt', data: 'inside', method: 8 }]));
    const archive = new OpenOnDemandArchive(zipPath);

    const pointer = new ZipEntryPathPointer(archive, 'corpora/x/y.txt');
    assert.equal(decode(pointer.open().read()), 'inside');
    assert.equal(pointer.fileSize(), 6);
    assert.equal(pointer.toString(), path.join(zipPath, 'corpora', 'x', 'y.txt'));
    assert.equal(pointer.describe(), `ZipEntryPathPointer(${JSON.stringify(zipPath)}, "corpora/x/y.txt")`);

    const directory = new ZipEntryPathPointer(archive, 'corpora/x/');
    assert.equal(directory.entry, 'corpora/x/');
    const child = directory.join('y.txt');
    assert.equal(child.entry, 'corpora/x/y.txt');
    assert.equal(child.archive, archive);

    const leading = new ZipEntryPathPointer(archive, '/corpora/x/y.txt');
    assert.equal(leading.entry, 'corpora/x/y.txt');

    for (const missing of ['corpora/x', 'corpora/z.txt']) {
      assert.throws(
        () => new ZipEntryPathPointer(archive, missing),
        (err: unknown) => err instanceof ZipError && err.code === 'ZIP_ENTRY_NOT_FOUND' && err.entryName === missing
      );
    }
  } finally {
    cleanup();
  }
});

test('joining through an unlisted directory reaches the entry below it', () => {
  const { dir, cleanup } = makeTempDir();
  try {
    const zipPath = writeFixture(dir, 'pkg.zip', buildZip([{ name: 'corpora/x/sub/y.txt', data: 'deep' }]));
    const archive = new OpenOnDemandArchive(zipPath);

    const sub = new ZipEntryPathPointer(archive, 'corpora/x/').join('sub');
    assert.equal(sub.entry, 'corpora/x/sub');
    const leaf = sub.join('y.txt');
    assert.equal(leaf.entry, 'corpora/x/sub/y.txt');
    assert.equal(leaf.archive, archive);
    assert.equal(decode(leaf.open().read()), 'deep');

    const missing = sub.join('none.txt');
    assert.equal(missing.entry, 'corpora/x/sub/none.txt');
    const isMissing = (err: unknown): boolean =>
      err instanceof ZipError && err.code === 'ZIP_ENTRY_NOT_FOUND' && err.entryName === 'corpora/x/sub/none.txt';
    assert.throws(() => missing.open(), isMissing);
    assert.throws(() => missing.fileSize(), isMissing);
  } finally {
    cleanup();
  }
});

test('zip entries ending in .gz are decompressed', () => {
  const { dir, cleanup } = makeTempDir();
  try {
    const zipPath = writeFixture(
      dir,
      'pkg.zip',
      buildZip([{ name: 'models/table.txt.gz', data: gzipSync(Buffer.from('packed\n')) }])
    );
    const pointer = new ZipEntryPathPointer(zipPath, 'models/table.txt.gz');
    assert.equal(decode(pointer.open().read()), 'packed\n');
    assert.equal(pointer.open('utf-8').read(), 'packed\n');
  } finally {
    cleanup();
  }
});

test('the archive root pointer has an empty entry', () => {
  const { dir, cleanup } = makeTempDir();
  try {
    const zipPath = writeFixture(dir, 'pkg.zip', buildZip([{ name: 'a.txt', data: 'a' }]));
    const root = new ZipEntryPathPointer(zipPath);
    assert.equal(root.entry, '');
    assert.equal(decode(root.join('a.txt').open().read()), 'a');
  } finally {
    cleanup();
  }
});
