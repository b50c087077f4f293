import test from 'node:test';
import assert from 'node:assert/strict';
import { once } from 'node:events';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { Writable } from 'node:stream';
import { gunzipSync } from 'node:zlib';
import { ResourceError } from '../src/resource/errors.js';
import { BufferedGzipWriter } from '../src/writer/BufferedGzipWriter.js';
import { makeTempDir } from './zipFixture.js';

function memorySink(): { sink: Writable; contents: () => Buffer } {
  const chunks: Buffer[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    }
  });
  return { sink, contents: () => Buffer.concat(chunks) };
}

test('writes a gzip member that decompresses to the input', async () => {
  const { sink, contents } = memorySink();
  const writer = new BufferedGzipWriter(sink);
  await writer.write('first line\n');
  await writer.write(new TextEncoder().encode('second line\n'));
  await writer.close();
  assert.equal(gunzipSync(contents()).toString('utf8'), 'first line\nsecond line\n');
  assert.equal(writer.bytesWritten, 23);
});

test('a small buffer hands blocks to gzip as it fills', async () => {
  const { sink, contents } = memorySink();
  const writer = new BufferedGzipWriter(sink, { bufferSize: 4, level: 1 });
  const parts = ['ab', 'cdefgh', '', 'ij', 'klmnopqrstuvwxyz'];
  for (const part of parts) {
    await writer.write(part);
  }
  await writer.close();
  assert.equal(gunzipSync(contents()).toString('utf8'), parts.join(''));
  assert.equal(writer.bytesWritten, 26);
});

test('flush keeps the writer usable', async () => {
  const { sink, contents } = memorySink();
  const writer = new BufferedGzipWriter(sink);
  await writer.write('before ');
  await writer.flush();
  await writer.write('after');
  await writer.close();
  assert.equal(gunzipSync(contents()).toString('utf8'), 'before after');
});

test('close is idempotent and later writes fail', async () => {
  const { sink } = memorySink();
  const writer = new BufferedGzipWriter(sink);
  await writer.close();
  await writer.close();
  assert.equal(writer.closed, true);
  await assert.rejects(
    writer.write('late'),
    (err: unknown) => err instanceof ResourceError && err.code === 'RESOURCE_CLOSED'
  );
  await assert.rejects(
    writer.flush(),
    (err: unknown) => err instanceof ResourceError && err.code === 'RESOURCE_CLOSED'
  );
});

test('destination failures surface from close', async () => {
  const sink = new Writable({
    write(_chunk: Buffer, _encoding, callback) {
      callback(new Error('disk full'));
    }
  });
  const writer = new BufferedGzipWriter(sink);
  await writer.write('payload');
  await assert.rejects(writer.close(), /disk full/);
});

test('flush after a destination failure rejects with that failure', async () => {
  const { sink } = memorySink();
  const writer = new BufferedGzipWriter(sink);
  await writer.write('payload');
  const closed = once(sink, 'close');
  sink.destroy(new Error('disk full'));
  await closed;
  await assert.rejects(writer.flush(), /disk full/);
});

test('toFile writes a gzip file', async () => {
  const { dir, cleanup } = makeTempDir();
  try {
    const target = path.join(dir, 'out.txt.gz');
    const writer = BufferedGzipWriter.toFile(target, { bufferSize: 8 });
    for (let i = 0; i < 5; i += 1) {
      await writer.write(`row ${i}\n`);
    }
    await writer.close();
    assert.equal(gunzipSync(readFileSync(target)).toString('utf8'), 'row 0\nrow 1\nrow 2\nrow 3\nrow 4\n');
  } finally {
    cleanup();
  }
});
