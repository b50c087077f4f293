import test from 'node:test';
import assert from 'node:assert/strict';
import { ResourceError } from '../src/resource/errors.js';
import { BufferByteStream, FileByteStream } from '../src/streams/ByteStream.js';
import {
  SeekableUnicodeStreamReader,
  type SeekableUnicodeStreamReaderOptions
} from '../src/text/SeekableUnicodeStreamReader.js';
import { encodeText } from './encodeText.js';
import { makeTempDir, writeFixture } from './zipFixture.js';

const utf8 = (text: string): Uint8Array => new TextEncoder().encode(text);

function readerOver(
  bytes: Uint8Array,
  encoding = 'utf-8',
  options: SeekableUnicodeStreamReaderOptions = {}
): SeekableUnicodeStreamReader {
  return new SeekableUnicodeStreamReader(new BufferByteStream(bytes, 'sample.txt'), encoding, options);
}

test('readline returns lines with their terminators, then empty string', () => {
  const reader = readerOver(utf8('line one\nline two\r\nthird'));
  assert.equal(reader.readline(), 'line one\n');
  assert.equal(reader.readline(), 'line two\r\n');
  assert.equal(reader.readline(), 'third');
  assert.equal(reader.readline(), '');
});

test('read returns buffered lines before new text', () => {
  const reader = readerOver(utf8('x\ny\nz'));
  assert.equal(reader.readline(), 'x\n');
  assert.equal(reader.read(), 'y\nz');
  assert.equal(reader.read(), '');
});

test('tell reports the byte offset of the next line while lines are buffered', () => {
  const reader = readerOver(utf8('line one\nline two\r\nthird'));
  reader.readline();
  assert.equal(reader.tell(), 9);
  reader.readline();
  assert.equal(reader.tell(), 19);
  reader.seek(9);
  assert.equal(reader.read(), 'line two\r\nthird');
});

test('tell counts multi-byte characters', () => {
  const reader = readerOver(utf8('aé\nbé\n'));
  assert.equal(reader.readline(), 'aé\n');
  assert.equal(reader.tell(), 4);
  assert.equal(reader.readline(), 'bé\n');
  assert.equal(reader.tell(), 8);
});

test('tell is exact when a character straddles the read-ahead boundary', () => {
  const reader = readerOver(utf8('ab\n€€\nxy'), 'utf-8', { limits: { readlineInitialBytes: 4 } });
  assert.equal(reader.readline(), 'ab\n');
  assert.equal(reader.tell(), 3);
  assert.equal(reader.readline(), '€€\n');
  assert.equal(reader.tell(), 10);
  assert.equal(reader.readline(), 'xy');
});

test('read(size) keeps an incomplete character for the next read', () => {
  const reader = readerOver(utf8('aé'));
  assert.equal(reader.read(2), 'a');
  assert.equal(reader.tell(), 1);
  assert.equal(reader.read(1), 'é');
  assert.equal(reader.read(1), '');
});

test('read(size) reads on until one character is complete', () => {
  const reader = readerOver(utf8('€z'));
  assert.equal(reader.read(1), '€');
  assert.equal(reader.tell(), 3);
});

test('readline(size) may return a partial line', () => {
  const reader = readerOver(utf8('abcdef\n'));
  assert.equal(reader.readline(3), 'abc');
  assert.equal(reader.readline(), 'def\n');
});

test('a carriage return at the end of a read pulls in the following newline', () => {
  const reader = readerOver(utf8('a\r\nb'));
  assert.equal(reader.readline(2), 'a\r\n');
  assert.equal(reader.readline(), 'b');
});

test('a UTF-8 byte order mark is skipped and counted in offsets', () => {
  const bytes = Uint8Array.of(0xef, 0xbb, 0xbf, ...utf8('hi\nyo\n'));
  const reader = readerOver(bytes);
  assert.equal(reader.tell(), 0);
  assert.equal(reader.readline(), 'hi\n');
  assert.equal(reader.tell(), 6);
  reader.seek(0);
  assert.equal(reader.read(), 'hi\nyo\n');
});

test('utf-16 narrows to the byte order named by the mark', () => {
  const bytes = Uint8Array.of(0xff, 0xfe, ...encodeText('ab\ncd\n', 'utf-16-le'));
  const reader = readerOver(bytes, 'utf-16');
  assert.equal(reader.encoding, 'utf-16-le');
  assert.equal(reader.readline(), 'ab\n');
  assert.equal(reader.tell(), 8);
  reader.seek(8);
  assert.equal(reader.readline(), 'cd\n');
  reader.seek(0);
  assert.equal(reader.read(), 'ab\ncd\n');
});

test('big-endian marks are honoured', () => {
  const bytes = Uint8Array.of(0xfe, 0xff, ...encodeText('ok', 'utf-16-be'));
  const reader = readerOver(bytes, 'UTF-16');
  assert.equal(reader.encoding, 'utf-16-be');
  assert.equal(reader.read(), 'ok');

  const wide = Uint8Array.of(0x00, 0x00, 0xfe, 0xff, ...encodeText('ok', 'utf-32-be'));
  const wideReader = readerOver(wide, 'utf-32');
  assert.equal(wideReader.encoding, 'utf-32-be');
  assert.equal(wideReader.read(), 'ok');
});

test('unmarked utf-16 is read as little endian', () => {
  const reader = readerOver(encodeText('hi', 'utf-16-le'), 'utf16');
  assert.equal(reader.encoding, 'utf-16-le');
  assert.equal(reader.read(), 'hi');
});

test('charSeekForward moves by characters', () => {
  const reader = readerOver(utf8('été\n\u{1f600}!'));
  reader.charSeekForward(2);
  assert.equal(reader.tell(), 3);
  assert.equal(reader.read(), 'é\n\u{1f600}!');

  reader.seek(0);
  assert.equal(reader.readline(), 'été\n');
  reader.charSeekForward(1);
  assert.equal(reader.read(), '!');
});

test('charSeekForward past the end stops at the end', () => {
  const reader = readerOver(utf8('abc'));
  reader.charSeekForward(10);
  assert.equal(reader.tell(), 3);
  assert.equal(reader.read(), '');
});

test('charSeekForward rejects negative and fractional offsets', () => {
  const reader = readerOver(utf8('abc'));
  assert.throws(() => reader.charSeekForward(-1), RangeError);
  assert.throws(() => reader.charSeekForward(1.5), RangeError);
});

test('relative seeks are rejected', () => {
  const reader = readerOver(utf8('abc'));
  assert.throws(
    () => reader.seek(1, 1),
    (err: unknown) => err instanceof ResourceError && err.code === 'RESOURCE_UNSUPPORTED_OPERATION'
  );
});

test('seek from the end is passed to the stream', () => {
  const reader = readerOver(utf8('abc'));
  reader.seek(-1, 2);
  assert.equal(reader.read(), 'c');
});

test('strict decoding wraps codec failures', () => {
  const reader = readerOver(Uint8Array.of(0x61, 0xff, 0x62));
  assert.throws(
    () => reader.read(),
    (err: unknown) =>
      err instanceof ResourceError &&
      err.code === 'RESOURCE_DECODE_ERROR' &&
      err.resourceName === 'sample.txt' &&
      err.context?.start === '1' &&
      err.context.end === '2'
  );
});

test('replace mode substitutes malformed bytes', () => {
  const reader = readerOver(Uint8Array.of(0x61, 0xff, 0x62), 'utf-8', { errors: 'replace' });
  assert.equal(reader.read(), 'a\ufffdb');
});

test('an unknown encoding is rejected on construction', () => {
  assert.throws(
    () => readerOver(utf8('a'), 'klingon'),
    (err: unknown) => err instanceof ResourceError && err.code === 'RESOURCE_UNKNOWN_ENCODING'
  );
});

test('debug mode verifies tell against a fresh decode', () => {
  const reader = readerOver(utf8('éé\nabc\n€\n'), 'utf-8', { debug: true });
  reader.readline();
  assert.equal(reader.tell(), 5);
  reader.readline();
  assert.equal(reader.tell(), 9);
});

test('iteration, readlines and discardLine', () => {
  assert.deepEqual([...readerOver(utf8('a\nb\n\nc'))], ['a\n', 'b\n', '\n', 'c']);

  const reader = readerOver(utf8('a\nb\nc\n'));
  reader.discardLine();
  assert.deepEqual(reader.readlines(), ['b\n', 'c\n']);

  const unbuffered = readerOver(utf8('a\nb\nc\n'));
  unbuffered.discardLine();
  unbuffered.discardLine();
  assert.deepEqual(unbuffered.readlines(false), ['c']);
});

test('a file-backed reader closes its stream', () => {
  const { dir, cleanup } = makeTempDir();
  try {
    const file = writeFixture(dir, 'words.txt', 'one\ntwo\n');
    const reader = new SeekableUnicodeStreamReader(new FileByteStream(file), 'utf-8');
    assert.equal(reader.name, file);
    assert.equal(reader.readline(), 'one\n');
    assert.equal(reader.tell(), 4);
    assert.equal(reader.closed, false);
    reader.close();
    assert.equal(reader.closed, true);
    assert.throws(
      () => reader.read(),
      (err: unknown) => err instanceof ResourceError && err.code === 'RESOURCE_CLOSED'
    );
  } finally {
    cleanup();
  }
});
