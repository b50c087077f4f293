import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { BufferByteStream, FileByteStream } from '../src/streams/ByteStream.js';
import { ResourceError } from '../src/resource/errors.js';
import { makeTempDir, writeFixture } from './zipFixture.js';

const text = (data: Uint8Array): string => new TextDecoder().decode(data);

test('BufferByteStream reads, seeks and tells', () => {
  const stream = new BufferByteStream(new TextEncoder().encode('abcdef'), 'mem');
  assert.equal(text(stream.read(2)), 'ab');
  assert.equal(stream.tell(), 2);
  assert.equal(stream.seek(-1, 2), 5);
  assert.equal(text(stream.read()), 'f');
  assert.equal(stream.read(4).length, 0);
  stream.seek(1);
  assert.equal(stream.seek(2, 1), 3);
  assert.equal(text(stream.read(-1)), 'def');
  assert.equal(stream.size(), 6);
  assert.equal(stream.name, 'mem');
});

test('seeking before the start is a RangeError', () => {
  const stream = new BufferByteStream(Uint8Array.of(1, 2, 3));
  assert.throws(() => stream.seek(-1), RangeError);
  assert.throws(() => stream.seek(-4, 2), RangeError);
});

test('a closed stream rejects reads', () => {
  const stream = new BufferByteStream(Uint8Array.of(1));
  stream.close();
  assert.equal(stream.closed, true);
  assert.throws(
    () => stream.read(),
    (err: unknown) => err instanceof ResourceError && err.code === 'RESOURCE_CLOSED'
  );
});

test('FileByteStream reads with positioned reads', () => {
  const { dir, cleanup } = makeTempDir();
  try {
    const file = writeFixture(dir, 'data.bin', 'hello world');
    const stream = new FileByteStream(file);
    assert.equal(stream.name, path.resolve(file));
    assert.equal(stream.size(), 11);
    assert.equal(text(stream.read(5)), 'hello');
    stream.seek(6);
    assert.equal(text(stream.read()), 'world');
    assert.equal(stream.read(3).length, 0);
    stream.seek(-5, 2);
    assert.equal(text(stream.read(100)), 'world');
    stream.close();
    stream.close();
    assert.equal(stream.closed, true);
    assert.throws(() => stream.tell(), ResourceError);
  } finally {
    cleanup();
  }
});
