import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import type { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { constants, createGzip, type Gzip } from 'node:zlib';
import { concatBytes, encodeUtf8 } from '../binary.js';
import { DEFAULT_READER_LIMITS } from '../limits.js';
import { ResourceError } from '../resource/errors.js';

/** Options for {@link BufferedGzipWriter}. */
export type BufferedGzipWriterOptions = {
  /** Bytes collected before they are handed to gzip (default 2 MiB). */
  bufferSize?: number;
  /** zlib compression level, 0-9 (default 9). */
  level?: number;
};

/**
 * Gzip writer that batches small writes in memory and hands them to the
 * compressor in large blocks.
 */
export class BufferedGzipWriter {
  /** Uncompressed bytes accepted so far. */
  bytesWritten = 0;
  private readonly gzip: Gzip;
  private readonly bufferSize: number;
  private readonly finished: Promise<void>;
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private failure: unknown = null;
  private isClosed = false;

  constructor(destination: Writable, options: BufferedGzipWriterOptions = {}) {
    this.bufferSize = options.bufferSize ?? DEFAULT_READER_LIMITS.gzipWriteBufferBytes;
    this.gzip = createGzip({ level: options.level ?? 9 });
    this.finished = pipeline(this.gzip, destination).then(
      () => undefined,
      (err: unknown) => {
        this.failure = err;
      }
    );
  }

  /** Writer that compresses into a newly created (or truncated) file. */
  static toFile(filename: string, options: BufferedGzipWriterOptions = {}): BufferedGzipWriter {
    return new BufferedGzipWriter(createWriteStream(filename), options);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Buffer `chunk` (strings are UTF-8 encoded). When it does not fit, the
   * current buffer goes to gzip and `chunk` starts the next one.
   */
  async write(chunk: Uint8Array | string): Promise<void> {
    this.ensureWritable();
    const bytes = typeof chunk === 'string' ? encodeUtf8(chunk) : chunk;
    if (bytes.length === 0) return;
    this.bytesWritten += bytes.length;
    if (this.buffered + bytes.length > this.bufferSize) {
      await this.drainBuffer();
    }
    this.chunks.push(bytes);
    this.buffered += bytes.length;
  }

  /** Hand buffered bytes to gzip and sync-flush the compressor. */
  async flush(): Promise<void> {
    this.ensureWritable();
    await this.drainBuffer();
    if (this.gzip.destroyed) {
      // A destroyed compressor never calls back; the pipeline outcome sets `failure`.
      await this.finished;
    } else {
      await Promise.race([
        new Promise<void>((resolve) => {
          this.gzip.flush(constants.Z_SYNC_FLUSH, resolve);
        }),
        this.finished
      ]);
    }
    this.throwIfFailed();
  }

  /** Flush, finish the gzip member and wait until the destination has everything. */
  async close(): Promise<void> {
    if (this.isClosed) return;
    this.throwIfFailed();
    await this.drainBuffer();
    this.isClosed = true;
    this.gzip.end();
    await this.finished;
    this.throwIfFailed();
  }

  private async drainBuffer(): Promise<void> {
    if (this.buffered === 0) return;
    const data = concatBytes(this.chunks);
    this.chunks = [];
    this.buffered = 0;
    if (!this.gzip.write(data)) {
      await Promise.race([once(this.gzip, 'drain'), this.finished]);
    }
    this.throwIfFailed();
  }

  private ensureWritable(): void {
    if (this.isClosed) {
      throw new ResourceError('RESOURCE_CLOSED', 'Write to a closed gzip writer');
    }
    this.throwIfFailed();
  }

  private throwIfFailed(): void {
    if (this.failure !== null) {
      throw this.failure;
    }
  }
}
