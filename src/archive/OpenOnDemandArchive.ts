import path from 'node:path';
import { ZipError, type ZipWarning } from '../errors.js';
import { resolveReaderLimits, type ReaderLimits } from '../limits.js';
import { readCentralDirectory, type ZipEntryRecord } from '../reader/centralDirectory.js';
import { readEntryData } from '../reader/entryData.js';
import { findEocd } from '../reader/eocd.js';
import { openFileRandomAccess, type RandomAccess, type RandomAccessFactory } from '../reader/RandomAccess.js';

export type { ZipEntryRecord } from '../reader/centralDirectory.js';

export interface OpenOnDemandArchiveOptions {
  /** Opens the archive file; called once at construction and once per read. */
  openFile?: RandomAccessFactory;
  limits?: ReaderLimits;
}

/**
 * Read-only ZIP archive that holds no file descriptor between calls.
 *
 * The central directory is read once at construction and kept in memory; every
 * `read()` reopens the file, reads a single entry and closes it again.
 */
export class OpenOnDemandArchive {
  /** Absolute path of the archive file. */
  readonly filename: string;
  private readonly openFile: RandomAccessFactory;
  private readonly limits: Required<ReaderLimits>;
  private readonly entriesByName = new Map<string, ZipEntryRecord>();
  private readonly entryList: ZipEntryRecord[];
  private readonly warningsList: ZipWarning[] = [];

  constructor(filename: string, options?: OpenOnDemandArchiveOptions) {
    this.filename = path.resolve(filename);
    this.openFile = options?.openFile ?? openFileRandomAccess;
    this.limits = resolveReaderLimits(options?.limits);
    this.entryList = this.loadDirectory();
    for (const entry of this.entryList) {
      // Later duplicates win, as with most extractors.
      this.entriesByName.set(entry.name, entry);
    }
  }

  /** Entry names in central directory order. */
  names(): string[] {
    return this.entryList.map((entry) => entry.name);
  }

  getEntry(name: string): ZipEntryRecord | undefined {
    const entry = this.entriesByName.get(name);
    return entry ? { ...entry } : undefined;
  }

  /**
   * True when some listed entry lives under `prefix`. The prefix must end
   * with `/` so that `dir` does not match a sibling file named `dirx`.
   */
  hasDirectory(prefix: string): boolean {
    if (!prefix.endsWith('/')) return false;
    return this.entryList.some((entry) => entry.name.startsWith(prefix));
  }

  warnings(): ZipWarning[] {
    return [...this.warningsList];
  }

  /** Read one entry's contents, reopening and closing the archive file. */
  read(name: string): Uint8Array {
    const entry = this.entriesByName.get(name);
    if (!entry) {
      throw new ZipError('ZIP_ENTRY_NOT_FOUND', `Zip file ${this.filename} does not contain ${name}`, {
        entryName: name,
        archivePath: this.filename
      });
    }
    return this.withFile((reader) => readEntryData(reader, entry, this.limits.maxZipEntryBytes));
  }

  toString(): string {
    return this.filename;
  }

  private withFile<T>(fn: (reader: RandomAccess) => T): T {
    const reader = this.openFile(this.filename);
    try {
      return fn(reader);
    } finally {
      reader.close();
    }
  }

  private loadDirectory(): ZipEntryRecord[] {
    try {
      return this.withFile((reader) => this.readDirectory(reader));
    } catch (err) {
      throw new ZipError('ZIP_ARCHIVE_CONSTRUCT_FAILED', `Cannot open ${this.filename} as a zip archive`, {
        archivePath: this.filename,
        cause: err
      });
    }
  }

  private readDirectory(reader: RandomAccess): ZipEntryRecord[] {
    const eocd = findEocd(reader, {
      maxSearchBytes: this.limits.maxZipEocdSearchBytes,
      maxCentralDirectoryBytes: this.limits.maxZipCentralDirectoryBytes,
      maxEntries: this.limits.maxZipEntries
    });
    this.warningsList.push(...eocd.warnings);
    const prefixBytes = eocd.zip64 ? 0 : Math.max(0, eocd.eocdOffset - eocd.cdSize - eocd.cdOffset);
    return readCentralDirectory(reader, {
      cdOffset: eocd.cdOffset,
      cdSize: eocd.cdSize,
      totalEntries: eocd.totalEntries,
      prefixBytes,
      onWarning: (warning) => this.warningsList.push(warning)
    });
  }
}
