import { closeSync, fstatSync, openSync, readSync } from 'node:fs';
import path from 'node:path';
import { concatBytes } from '../binary.js';
import { ResourceError } from '../resource/errors.js';

/** `0`: from the start, `1`: from the current position, `2`: from the end. */
export type SeekWhence = 0 | 1 | 2;

/** Synchronous, seekable source of bytes with a file-like cursor. */
export interface ByteStream {
  readonly name: string | undefined;
  readonly closed: boolean;
  /** Read up to `size` bytes; an absent or negative size reads to the end. */
  read(size?: number): Uint8Array;
  /** Move the cursor and return the new absolute position. */
  seek(offset: number, whence?: SeekWhence): number;
  tell(): number;
  size(): number;
  close(): void;
}

function resolveSeek(offset: number, whence: SeekWhence, position: number, size: () => number): number {
  let target: number;
  switch (whence) {
    case 0:
      target = offset;
      break;
    case 1:
      target = position + offset;
      break;
    case 2:
      target = size() + offset;
      break;
    default: {
      const exhaustive: never = whence;
      return exhaustive;
    }
  }
  if (!Number.isInteger(target) || target < 0) {
    throw new RangeError(`Invalid seek position ${target}`);
  }
  return target;
}

/** A byte stream over an in-memory buffer (zip entries, gunzipped files). */
export class BufferByteStream implements ByteStream {
  private position = 0;
  private isClosed = false;

  constructor(
    private readonly data: Uint8Array,
    readonly name: string | undefined = undefined
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  read(size?: number): Uint8Array {
    this.ensureOpen();
    const start = Math.min(this.position, this.data.length);
    const end = size === undefined || size < 0 ? this.data.length : Math.min(this.data.length, start + size);
    this.position = Math.max(this.position, end);
    return this.data.subarray(start, end);
  }

  seek(offset: number, whence: SeekWhence = 0): number {
    this.ensureOpen();
    this.position = resolveSeek(offset, whence, this.position, () => this.data.length);
    return this.position;
  }

  tell(): number {
    this.ensureOpen();
    return this.position;
  }

  size(): number {
    return this.data.length;
  }

  close(): void {
    this.isClosed = true;
  }

  private ensureOpen(): void {
    if (this.isClosed) {
      throw new ResourceError('RESOURCE_CLOSED', 'I/O operation on a closed stream', { resourceName: this.name });
    }
  }
}

const READ_ALL_CHUNK = 64 * 1024;

/** A byte stream over an open file descriptor, using positioned reads. */
export class FileByteStream implements ByteStream {
  readonly name: string;
  private fd: number | null;
  private position = 0;

  constructor(filename: string) {
    this.name = path.resolve(filename);
    this.fd = openSync(this.name, 'r');
  }

  get closed(): boolean {
    return this.fd === null;
  }

  read(size?: number): Uint8Array {
    const fd = this.descriptor();
    if (size === undefined || size < 0) {
      const chunks: Uint8Array[] = [];
      while (true) {
        const chunk = this.readAt(fd, READ_ALL_CHUNK);
        if (chunk.length === 0) break;
        chunks.push(chunk);
      }
      return concatBytes(chunks);
    }
    const out = new Uint8Array(size);
    let filled = 0;
    while (filled < size) {
      const chunk = this.readAt(fd, size - filled);
      if (chunk.length === 0) break;
      out.set(chunk, filled);
      filled += chunk.length;
    }
    return filled === size ? out : out.subarray(0, filled);
  }

  seek(offset: number, whence: SeekWhence = 0): number {
    const fd = this.descriptor();
    this.position = resolveSeek(offset, whence, this.position, () => fstatSync(fd).size);
    return this.position;
  }

  tell(): number {
    this.descriptor();
    return this.position;
  }

  size(): number {
    return fstatSync(this.descriptor()).size;
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }

  private readAt(fd: number, length: number): Uint8Array {
    const buffer = new Uint8Array(length);
    const bytesRead = readSync(fd, buffer, 0, length, this.position);
    this.position += bytesRead;
    return bytesRead === length ? buffer : buffer.subarray(0, bytesRead);
  }

  private descriptor(): number {
    if (this.fd === null) {
      throw new ResourceError('RESOURCE_CLOSED', 'I/O operation on a closed stream', { resourceName: this.name });
    }
    return this.fd;
  }
}
