import { closeSync, fstatSync, openSync, readSync } from 'node:fs';

/** Synchronous positional reads over an archive's bytes. */
export interface RandomAccess {
  size(): number;
  read(offset: number, length: number): Uint8Array;
  close(): void;
}

export class BufferRandomAccess implements RandomAccess {
  constructor(private readonly data: Uint8Array) {}

  size(): number {
    return this.data.length;
  }

  read(offset: number, length: number): Uint8Array {
    const end = Math.min(this.data.length, offset + length);
    return this.data.subarray(offset, end);
  }

  close(): void {
    return;
  }
}

/** Random access over one file descriptor, opened at construction. */
export class FileRandomAccess implements RandomAccess {
  private fd: number | null;

  constructor(readonly path: string) {
    this.fd = openSync(path, 'r');
  }

  get closed(): boolean {
    return this.fd === null;
  }

  size(): number {
    return fstatSync(this.descriptor()).size;
  }

  read(offset: number, length: number): Uint8Array {
    const fd = this.descriptor();
    const buffer = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const bytesRead = readSync(fd, buffer, filled, length - filled, offset + filled);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return filled === length ? buffer : buffer.subarray(0, filled);
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    closeSync(fd);
  }

  private descriptor(): number {
    if (this.fd === null) {
      throw new Error(`File ${this.path} is closed`);
    }
    return this.fd;
  }
}

export type RandomAccessFactory = (path: string) => RandomAccess;

export const openFileRandomAccess: RandomAccessFactory = (path) => new FileRandomAccess(path);
