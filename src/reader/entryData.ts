import { inflateRawSync } from 'node:zlib';
import { crc32 } from '../crc32.js';
import { ZipError } from '../errors.js';
import type { RandomAccess } from './RandomAccess.js';
import type { ZipEntryRecord } from './centralDirectory.js';
import { readLocalDataOffset } from './localHeader.js';

const METHOD_STORE = 0;
const METHOD_DEFLATE = 8;

/** Read, inflate and CRC-check one entry's full contents. */
export function readEntryData(reader: RandomAccess, entry: ZipEntryRecord, maxEntryBytes: number): Uint8Array {
  if (entry.encrypted) {
    throw new ZipError('ZIP_UNSUPPORTED_ENCRYPTION', 'Encrypted entries are not supported', {
      entryName: entry.name
    });
  }
  if (entry.uncompressedSize > maxEntryBytes) {
    throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Entry exceeds maximum uncompressed size', {
      entryName: entry.name,
      context: {
        requiredEntryBytes: String(entry.uncompressedSize),
        limitEntryBytes: String(maxEntryBytes)
      }
    });
  }

  const dataOffset = readLocalDataOffset(reader, entry);
  const raw = reader.read(dataOffset, entry.compressedSize);
  if (raw.length < entry.compressedSize) {
    throw new ZipError('ZIP_TRUNCATED', 'Entry data truncated', { entryName: entry.name });
  }

  let data: Uint8Array;
  switch (entry.method) {
    case METHOD_STORE:
      data = raw;
      break;
    case METHOD_DEFLATE:
      try {
        data = new Uint8Array(inflateRawSync(raw, { maxOutputLength: Math.max(1, maxEntryBytes) }));
      } catch (err) {
        throw new ZipError('ZIP_BAD_DATA', 'Invalid deflate data', { entryName: entry.name, cause: err });
      }
      break;
    default:
      throw new ZipError('ZIP_UNSUPPORTED_METHOD', `Unsupported compression method ${entry.method}`, {
        entryName: entry.name,
        method: entry.method
      });
  }

  if (data.length !== entry.uncompressedSize) {
    throw new ZipError('ZIP_BAD_DATA', 'Entry size does not match the central directory', {
      entryName: entry.name,
      context: {
        expectedBytes: String(entry.uncompressedSize),
        actualBytes: String(data.length)
      }
    });
  }
  if (crc32(data) !== entry.crc32) {
    throw new ZipError('ZIP_BAD_CRC', 'CRC-32 mismatch', { entryName: entry.name });
  }
  return data;
}
