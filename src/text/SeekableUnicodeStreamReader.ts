import { concatBytes, startsWithBytes } from '../binary.js';
import { resolveReaderLimits, type ReaderLimits } from '../limits.js';
import { ResourceError } from '../resource/errors.js';
import type { ByteStream, SeekWhence } from '../streams/ByteStream.js';
import {
  CodecDecodeError,
  countCodePoints,
  getCodec,
  normalizeEncodingName,
  UTF16_BE_BOM,
  UTF16_LE_BOM,
  UTF32_BE_BOM,
  UTF32_LE_BOM,
  UTF8_BOM,
  type DecodeErrorMode,
  type PartialDecode,
  type TextCodec
} from './codecs.js';
import { hasLineEnding, splitLines } from './lines.js';

/** Options for {@link SeekableUnicodeStreamReader}. */
export type SeekableUnicodeStreamReaderOptions = {
  /** Malformed input handling (default: `strict`). */
  errors?: DecodeErrorMode;
  /** Re-decode after every buffered `tell()` and throw if the result disagrees. */
  debug?: boolean;
  limits?: ReaderLimits;
};

type BomRule = {
  bom: Uint8Array;
  /** Encoding the reader switches to once this mark is seen. */
  encoding?: string;
};

const BOM_RULES = new Map<string, BomRule[]>([
  ['utf8', [{ bom: UTF8_BOM }]],
  [
    'utf16',
    [
      { bom: UTF16_LE_BOM, encoding: 'utf-16-le' },
      { bom: UTF16_BE_BOM, encoding: 'utf-16-be' }
    ]
  ],
  ['utf16le', [{ bom: UTF16_LE_BOM }]],
  ['utf16be', [{ bom: UTF16_BE_BOM }]],
  [
    'utf32',
    [
      { bom: UTF32_LE_BOM, encoding: 'utf-32-le' },
      { bom: UTF32_BE_BOM, encoding: 'utf-32-be' }
    ]
  ],
  ['utf32le', [{ bom: UTF32_LE_BOM }]],
  ['utf32be', [{ bom: UTF32_BE_BOM }]]
]);

const UNMARKED_DEFAULTS = new Map<string, string>([
  ['utf16', 'utf-16-le'],
  ['utf32', 'utf-32-le']
]);

const EMPTY = new Uint8Array(0);

/**
 * Text reader over a seekable byte stream that decodes incrementally and can
 * report and restore its position as a byte offset, even while lines read
 * ahead are still buffered.
 *
 * Offsets returned by {@link tell} are byte offsets into the underlying
 * stream; passing one back to {@link seek} resumes reading at the same
 * character. Relative seeks are not supported, use
 * {@link charSeekForward} instead.
 */
export class SeekableUnicodeStreamReader implements Iterable<string> {
  private codec: TextCodec;
  private currentEncoding: string;
  private readonly errors: DecodeErrorMode;
  private readonly debug: boolean;
  private readonly limits: Required<ReaderLimits>;
  private readonly bomLength: number;

  /** Bytes read from the stream that do not yet form a whole character. */
  private byteBuffer: Uint8Array = EMPTY;
  /** Lines decoded by `readline()` but not yet returned; `null` when empty. */
  private lineBuffer: string[] | null = null;
  /** Stream offset at which the characters in `lineBuffer` began to be read. */
  private rewindCheckpoint = 0;
  /** Characters returned since `rewindCheckpoint`. */
  private rewindCharCount: number | null = null;

  constructor(
    private readonly stream: ByteStream,
    encoding: string,
    options: SeekableUnicodeStreamReaderOptions = {}
  ) {
    this.errors = options.errors ?? 'strict';
    this.debug = options.debug ?? false;
    this.limits = resolveReaderLimits(options.limits);
    this.codec = getCodec(encoding);
    this.currentEncoding = encoding;
    stream.seek(0);
    this.bomLength = this.detectBom();
  }

  /** Encoding in use; generic UTF-16/32 narrow to a byte order once the BOM is seen. */
  get encoding(): string {
    return this.currentEncoding;
  }

  get name(): string | undefined {
    return this.stream.name;
  }

  get closed(): boolean {
    return this.stream.closed;
  }

  /**
   * Read up to `size` bytes' worth of text (the whole remainder when absent).
   * Buffered lines are returned first.
   */
  read(size?: number): string {
    let chars = this.readDecoded(size);
    if (this.lineBuffer) {
      chars = this.lineBuffer.join('') + chars;
      this.lineBuffer = null;
      this.rewindCharCount = null;
    }
    return chars;
  }

  /**
   * Read one line including its terminator. Returns `''` at the end of the
   * stream. With `size`, at most one read of `size` bytes is attempted and a
   * partial line may be returned.
   */
  readline(size?: number): string {
    if (this.lineBuffer && this.lineBuffer.length > 1) {
      const line = this.lineBuffer.shift();
      if (line !== undefined) {
        this.rewindCharCount = (this.rewindCharCount ?? 0) + countCodePoints(line);
        return line;
      }
    }

    let readSize = size || this.limits.readlineInitialBytes;
    let chars = '';
    if (this.lineBuffer) {
      chars = this.lineBuffer.pop() ?? '';
      this.lineBuffer = null;
    }

    while (true) {
      this.skipBom();
      const startPos = this.stream.tell() - this.byteBuffer.length;
      let newChars = this.readDecoded(readSize);
      // A lone \r may be the first half of \r\n.
      if (newChars.endsWith('\r')) {
        newChars += this.readDecoded(1);
      }
      chars += newChars;

      const lines = splitLines(chars, true);
      const [first] = lines;
      if (lines.length > 1 && first !== undefined) {
        this.lineBuffer = lines.slice(1);
        this.rewindCharCount = countCodePoints(newChars) - (countCodePoints(chars) - countCodePoints(first));
        this.rewindCheckpoint = startPos;
        return first;
      }
      if (lines.length === 1 && first !== undefined && hasLineEnding(first)) {
        return first;
      }
      if (!newChars || size !== undefined) {
        return chars;
      }
      if (readSize < this.limits.readlineMaxBytes) {
        readSize *= 2;
      }
    }
  }

  /** Read the rest of the stream as lines. */
  readlines(keepEnds = true): string[] {
    return splitLines(this.read(), keepEnds);
  }

  /** Skip the next line. */
  discardLine(): void {
    if (this.lineBuffer && this.lineBuffer.length > 1) {
      const line = this.lineBuffer.shift();
      if (line !== undefined) {
        this.rewindCharCount = (this.rewindCharCount ?? 0) + countCodePoints(line);
        return;
      }
    }
    this.readline();
  }

  *[Symbol.iterator](): Iterator<string> {
    while (true) {
      const line = this.readline();
      if (!line) return;
      yield line;
    }
  }

  /**
   * Move to byte `offset`, which must be a character boundary such as a value
   * returned by {@link tell}. Clears all buffered text.
   */
  seek(offset: number, whence: SeekWhence = 0): void {
    if (whence === 1) {
      throw new ResourceError(
        'RESOURCE_UNSUPPORTED_OPERATION',
        'Relative seek is not supported for text streams; use charSeekForward()',
        { resourceName: this.stream.name }
      );
    }
    this.stream.seek(offset, whence);
    this.lineBuffer = null;
    this.byteBuffer = EMPTY;
    this.rewindCharCount = null;
    this.rewindCheckpoint = this.stream.tell();
  }

  /** Move forward by `offset` characters from the current position. */
  charSeekForward(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`Character offset must be a non-negative integer, got ${offset}`);
    }
    this.seek(this.tell());
    this.seekForwardFrom(offset, offset);
  }

  /** Byte offset of the next character `read()` or `readline()` would return. */
  tell(): number {
    if (this.lineBuffer === null) {
      return this.stream.tell() - this.byteBuffer.length;
    }

    const origPos = this.stream.tell();
    const bytesRead = origPos - this.byteBuffer.length - this.rewindCheckpoint;
    const bufferedChars = this.lineBuffer.reduce((total, line) => total + countCodePoints(line), 0);
    const returnedChars = this.rewindCharCount ?? 0;
    const estimate =
      returnedChars + bufferedChars === 0
        ? 0
        : Math.floor((bytesRead * returnedChars) / (returnedChars + bufferedChars));

    this.stream.seek(this.rewindCheckpoint);
    this.seekForwardFrom(returnedChars, estimate);
    const filePos = this.stream.tell();

    if (this.debug) {
      const check = this.decodeAvailable(this.stream.read(this.limits.tellCheckBytes)).text;
      const buffered = this.lineBuffer.join('');
      if (!check.startsWith(buffered) && !buffered.startsWith(check)) {
        this.stream.seek(origPos);
        throw new Error(
          `tell() consistency check failed at ${filePos}: expected ${JSON.stringify(buffered.slice(0, 20))}, found ${JSON.stringify(check.slice(0, 20))}`
        );
      }
    }

    this.stream.seek(origPos);
    return filePos;
  }

  close(): void {
    this.stream.close();
  }

  /** Decode up to `size` new bytes, keeping an incomplete trailing character for later. */
  private readDecoded(size?: number): string {
    if (size === 0) return '';
    this.skipBom();

    const newBytes = this.stream.read(size);
    let bytes = this.byteBuffer.length > 0 ? concatBytes([this.byteBuffer, newBytes]) : newBytes;
    let decoded = this.decodeAvailable(bytes);

    // Read a byte at a time until at least one character is complete.
    if (size !== undefined && decoded.text === '' && newBytes.length > 0) {
      while (decoded.text === '') {
        const more = this.stream.read(1);
        if (more.length === 0) break;
        bytes = concatBytes([bytes, more]);
        decoded = this.decodeAvailable(bytes);
      }
    }

    this.byteBuffer = bytes.slice(decoded.consumed);
    return decoded.text;
  }

  /**
   * Position the stream `offset` characters after its current position,
   * starting from a guess of `estimate` bytes.
   */
  private seekForwardFrom(offset: number, estimate: number): void {
    this.skipBom();
    let estimateBytes = estimate;
    let bytes: Uint8Array = EMPTY;

    while (true) {
      const wanted = Math.max(0, estimateBytes - bytes.length);
      const newBytes = this.stream.read(wanted);
      bytes = concatBytes([bytes, newBytes]);
      let decoded = this.decodeAvailable(bytes);
      let count = countCodePoints(decoded.text);

      if (count === offset || (wanted > 0 && newBytes.length === 0 && count < offset)) {
        this.stream.seek(this.stream.tell() - bytes.length + decoded.consumed);
        return;
      }

      if (count > offset) {
        // Removing k bytes removes at most k characters, so this never undershoots.
        while (count > offset) {
          estimateBytes += offset - count;
          decoded = this.decodeAvailable(bytes.subarray(0, estimateBytes));
          count = countCodePoints(decoded.text);
        }
        this.stream.seek(this.stream.tell() - bytes.length + decoded.consumed);
        return;
      }

      estimateBytes += offset - count;
    }
  }

  private decodeAvailable(bytes: Uint8Array): PartialDecode {
    try {
      return this.codec.decodePartial(bytes, this.errors);
    } catch (err) {
      if (err instanceof CodecDecodeError) {
        throw new ResourceError('RESOURCE_DECODE_ERROR', err.message, {
          resourceName: this.stream.name,
          cause: err,
          context: { encoding: err.encoding, start: String(err.start), end: String(err.end) }
        });
      }
      throw err;
    }
  }

  private skipBom(): void {
    if (this.bomLength > 0 && this.stream.tell() === 0) {
      this.stream.read(this.bomLength);
    }
  }

  /** Length of the byte order mark at the start of the stream, narrowing the encoding if needed. */
  private detectBom(): number {
    const key = normalizeEncodingName(this.currentEncoding);
    const rules = BOM_RULES.get(key);
    if (!rules) return 0;

    const head = this.stream.read(16);
    this.stream.seek(0);
    for (const rule of rules) {
      if (startsWithBytes(head, rule.bom)) {
        if (rule.encoding) this.setEncoding(rule.encoding);
        return rule.bom.length;
      }
    }

    const unmarked = UNMARKED_DEFAULTS.get(key);
    if (unmarked) this.setEncoding(unmarked);
    return 0;
  }

  private setEncoding(encoding: string): void {
    this.codec = getCodec(encoding);
    this.currentEncoding = encoding;
  }
}
