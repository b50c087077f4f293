import { existsSync, readFileSync, statSync } from 'node:fs';
import path from 'node:path';
import { OpenOnDemandArchive } from '../archive/OpenOnDemandArchive.js';
import { gunzip, isGzipName } from '../compression/gzip.js';
import { ZipError } from '../errors.js';
import { BufferByteStream, FileByteStream, type ByteStream } from '../streams/ByteStream.js';
import {
  SeekableUnicodeStreamReader,
  type SeekableUnicodeStreamReaderOptions
} from '../text/SeekableUnicodeStreamReader.js';
import { ResourceError } from './errors.js';
import { normalizeResourceName } from './url.js';

/**
 * Handle on a readable resource that has not been opened yet.
 *
 * `open()` yields the raw bytes; `open(encoding)` wraps them in a
 * {@link SeekableUnicodeStreamReader}. Pointers are not strings: use
 * `toString()` for the path.
 */
export abstract class PathPointer {
  open(): ByteStream;
  open(encoding: string, options?: SeekableUnicodeStreamReaderOptions): SeekableUnicodeStreamReader;
  open(encoding?: string, options?: SeekableUnicodeStreamReaderOptions): ByteStream | SeekableUnicodeStreamReader {
    const stream = this.openBytes();
    if (encoding === undefined) return stream;
    try {
      return new SeekableUnicodeStreamReader(stream, encoding, options);
    } catch (err) {
      stream.close();
      throw err;
    }
  }

  /** Size in bytes of the resource as stored. */
  abstract fileSize(): number;

  /** Pointer to `child`, a `/`-separated path below this one. */
  abstract join(child: string): PathPointer;

  abstract toString(): string;

  /** Debug form naming the pointer kind. */
  abstract describe(): string;

  protected abstract openBytes(): ByteStream;
}

/** A file or directory on the local filesystem, identified by absolute path. */
export class FileSystemPathPointer extends PathPointer {
  readonly path: string;

  constructor(filePath: string) {
    super();
    const absolute = path.resolve(filePath);
    if (!existsSync(absolute)) {
      throw new ResourceError('RESOURCE_PATH_NOT_FOUND', `No such file or directory: ${JSON.stringify(absolute)}`, {
        resourceName: absolute
      });
    }
    this.path = absolute;
  }

  fileSize(): number {
    return statSync(this.path).size;
  }

  join(child: string): FileSystemPathPointer {
    return new FileSystemPathPointer(path.join(this.path, ...child.split('/')));
  }

  toString(): string {
    return this.path;
  }

  describe(): string {
    return `FileSystemPathPointer(${JSON.stringify(this.path)})`;
  }

  protected openBytes(): ByteStream {
    return new FileByteStream(this.path);
  }
}

/**
 * A gzip-compressed file; `open()` yields the decompressed bytes while
 * `fileSize()` reports the compressed size on disk.
 */
export class GzipFileSystemPathPointer extends FileSystemPathPointer {
  override describe(): string {
    return `GzipFileSystemPathPointer(${JSON.stringify(this.path)})`;
  }

  protected override openBytes(): ByteStream {
    return new BufferByteStream(gunzip(readFileSync(this.path), this.path), this.path);
  }
}

const UNLISTED = Symbol('unlisted');

/**
 * An entry (or directory prefix) inside a zip archive. Pointers joined from
 * the same one share a single {@link OpenOnDemandArchive}.
 */
export class ZipEntryPathPointer extends PathPointer {
  readonly archive: OpenOnDemandArchive;
  /** Entry name relative to the archive root; `''` is the root itself. */
  readonly entry: string;

  constructor(archive: OpenOnDemandArchive | string, entry = '', listing?: typeof UNLISTED) {
    super();
    this.archive = typeof archive === 'string' ? new OpenOnDemandArchive(archive) : archive;
    this.entry = entry ? normalizeResourceName(entry, true, '/').replace(/^\/+/, '') : '';
    if (listing !== UNLISTED && this.entry && !this.isListed()) {
      throw new ZipError(
        'ZIP_ENTRY_NOT_FOUND',
        `Zip file ${JSON.stringify(this.archive.filename)} does not contain ${JSON.stringify(this.entry)}`,
        { entryName: this.entry, archivePath: this.archive.filename }
      );
    }
  }

  fileSize(): number {
    const record = this.archive.getEntry(this.entry);
    if (!record) {
      throw new ZipError('ZIP_ENTRY_NOT_FOUND', `No file entry ${JSON.stringify(this.entry)} in ${this.archive.filename}`, {
        entryName: this.entry,
        archivePath: this.archive.filename
      });
    }
    return record.uncompressedSize;
  }

  /**
   * Child pointer over the same archive. The joined name is not checked
   * against the listing: a missing entry fails on `open()` or `fileSize()`.
   */
  join(child: string): ZipEntryPathPointer {
    const entry = this.entry ? `${this.entry.replace(/\/$/, '')}/${child}` : child;
    return new ZipEntryPathPointer(this.archive, entry, UNLISTED);
  }

  toString(): string {
    return path.join(this.archive.filename, ...this.entry.split('/'));
  }

  describe(): string {
    return `ZipEntryPathPointer(${JSON.stringify(this.archive.filename)}, ${JSON.stringify(this.entry)})`;
  }

  protected openBytes(): ByteStream {
    const data = this.archive.read(this.entry);
    const name = this.toString();
    return new BufferByteStream(isGzipName(this.entry) ? gunzip(data, name) : data, name);
  }

  private isListed(): boolean {
    if (this.archive.getEntry(this.entry)) return true;
    return this.entry.endsWith('/') && this.archive.hasDirectory(this.entry);
  }
}
