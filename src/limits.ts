/** Tunable ceilings and buffer sizes shared by the archive and text readers. */
export type ReaderLimits = {
  /** Maximum number of entries accepted from a central directory. */
  maxZipEntries?: number;
  /** Maximum uncompressed size of a single entry read into memory. */
  maxZipEntryBytes?: number;
  /** Maximum central directory size read while opening an archive. */
  maxZipCentralDirectoryBytes?: number;
  /** Bytes scanned backwards from EOF when looking for the end record. */
  maxZipEocdSearchBytes?: number;
  /** First read-ahead used by `readline()`. */
  readlineInitialBytes?: number;
  /** Read-ahead stops doubling once it reaches this size. */
  readlineMaxBytes?: number;
  /** Bytes re-decoded by the debug consistency check in `tell()`. */
  tellCheckBytes?: number;
  /** Default buffer of the gzip writer. */
  gzipWriteBufferBytes?: number;
};

const MiB = 1024 * 1024;

const DEFAULT_LIMITS = Object.freeze({
  maxZipEntries: 100_000,
  maxZipEntryBytes: 1024 * MiB,
  maxZipCentralDirectoryBytes: 64 * MiB,
  maxZipEocdSearchBytes: 0x10000 + 22,
  readlineInitialBytes: 72,
  readlineMaxBytes: 8000,
  tellCheckBytes: 50,
  gzipWriteBufferBytes: 2 * MiB
} satisfies Required<ReaderLimits>);

const LIMIT_KEYS = [
  'maxZipEntries',
  'maxZipEntryBytes',
  'maxZipCentralDirectoryBytes',
  'maxZipEocdSearchBytes',
  'readlineInitialBytes',
  'readlineMaxBytes',
  'tellCheckBytes',
  'gzipWriteBufferBytes'
] as const satisfies ReadonlyArray<keyof ReaderLimits>;

export const DEFAULT_READER_LIMITS: Readonly<Required<ReaderLimits>> = DEFAULT_LIMITS;

export function resolveReaderLimits(overrides?: ReaderLimits): Required<ReaderLimits> {
  const resolved: Required<ReaderLimits> = { ...DEFAULT_LIMITS };
  if (!overrides) return resolved;
  for (const key of LIMIT_KEYS) {
    const value = overrides[key];
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
      resolved[key] = Math.floor(value);
    }
  }
  return resolved;
}
