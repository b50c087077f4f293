import { decodeUtf8, readUint16LE, readUint32LE, toSafeNumber } from '../binary.js';
import { decodeCp437 } from '../cp437.js';
import { readZip64Extra } from '../extraFields.js';
import { ZipError, type ZipWarning } from '../errors.js';
import type { RandomAccess } from './RandomAccess.js';

const CDFH_SIGNATURE = 0x02014b50;
const CDFH_MIN_SIZE = 46;
const FLAG_ENCRYPTED = 0x1;
const FLAG_UTF8 = 0x800;

export interface ZipEntryRecord {
  name: string;
  method: number;
  crc32: number;
  compressedSize: number;
  uncompressedSize: number;
  /** Offset of the local file header, already shifted by any prefixed data. */
  offset: number;
  isDirectory: boolean;
  encrypted: boolean;
}

export interface CentralDirectoryOptions {
  cdOffset: number;
  cdSize: number;
  totalEntries: number;
  /** Bytes found in front of the archive (self-extractors, concatenated files). */
  prefixBytes: number;
  onWarning: (warning: ZipWarning) => void;
}

export function readCentralDirectory(reader: RandomAccess, options: CentralDirectoryOptions): ZipEntryRecord[] {
  const buffer = reader.read(options.cdOffset + options.prefixBytes, options.cdSize);
  if (buffer.length < options.cdSize) {
    throw new ZipError('ZIP_TRUNCATED', 'Central directory truncated');
  }

  const entries: ZipEntryRecord[] = [];
  let ptr = 0;
  while (buffer.length - ptr >= CDFH_MIN_SIZE) {
    if (readUint32LE(buffer, ptr) !== CDFH_SIGNATURE) {
      throw new ZipError('ZIP_BAD_CENTRAL_DIRECTORY', 'Invalid central directory signature', {
        offset: BigInt(options.cdOffset + ptr)
      });
    }
    const nameLen = readUint16LE(buffer, ptr + 28);
    const extraLen = readUint16LE(buffer, ptr + 30);
    const commentLen = readUint16LE(buffer, ptr + 32);
    const entrySize = CDFH_MIN_SIZE + nameLen + extraLen + commentLen;
    if (ptr + entrySize > buffer.length) {
      throw new ZipError('ZIP_TRUNCATED', 'Central directory truncated');
    }
    entries.push(parseEntry(buffer, ptr, options));
    ptr += entrySize;
  }

  if (ptr !== buffer.length) {
    options.onWarning({
      code: 'ZIP_BAD_CENTRAL_DIRECTORY',
      message: 'Central directory has trailing data; ignoring'
    });
  }
  if (options.totalEntries !== entries.length) {
    options.onWarning({
      code: 'ZIP_BAD_CENTRAL_DIRECTORY',
      message: 'Central directory entry count mismatch; using parsed entries'
    });
  }
  return entries;
}

function parseEntry(buffer: Uint8Array, ptr: number, options: CentralDirectoryOptions): ZipEntryRecord {
  const flags = readUint16LE(buffer, ptr + 8);
  const method = readUint16LE(buffer, ptr + 10);
  const crc32 = readUint32LE(buffer, ptr + 16);
  const compressedSize32 = readUint32LE(buffer, ptr + 20);
  const uncompressedSize32 = readUint32LE(buffer, ptr + 24);
  const nameLen = readUint16LE(buffer, ptr + 28);
  const extraLen = readUint16LE(buffer, ptr + 30);
  const diskStart = readUint16LE(buffer, ptr + 34);
  const offset32 = readUint32LE(buffer, ptr + 42);

  const nameStart = ptr + CDFH_MIN_SIZE;
  const nameBytes = buffer.subarray(nameStart, nameStart + nameLen);
  const extraBytes = buffer.subarray(nameStart + nameLen, nameStart + nameLen + extraLen);

  let name: string;
  if (flags & FLAG_UTF8) {
    try {
      name = decodeUtf8(nameBytes, true);
    } catch {
      name = decodeUtf8(nameBytes, false);
      options.onWarning({
        code: 'ZIP_INVALID_ENCODING',
        message: 'Invalid UTF-8 filename; using replacement characters',
        entryName: name
      });
    }
  } else {
    name = decodeCp437(nameBytes);
  }

  let compressedSize = compressedSize32;
  let uncompressedSize = uncompressedSize32;
  let offset = offset32;
  const needsZip64 =
    compressedSize32 === 0xffffffff || uncompressedSize32 === 0xffffffff || offset32 === 0xffffffff || diskStart === 0xffff;
  if (needsZip64) {
    const values = readZip64Extra(extraBytes, {
      uncompressed: uncompressedSize32 === 0xffffffff,
      compressed: compressedSize32 === 0xffffffff,
      offset: offset32 === 0xffffffff,
      diskStart: diskStart === 0xffff
    });
    if (!values) {
      throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 extra field missing or truncated', { entryName: name });
    }
    if (values.uncompressedSize !== undefined) {
      uncompressedSize = toSafeNumber(values.uncompressedSize, 'Uncompressed size');
    }
    if (values.compressedSize !== undefined) {
      compressedSize = toSafeNumber(values.compressedSize, 'Compressed size');
    }
    if (values.offset !== undefined) {
      offset = toSafeNumber(values.offset, 'Local header offset');
    }
  }

  return {
    name,
    method,
    crc32,
    compressedSize,
    uncompressedSize,
    offset: offset + options.prefixBytes,
    isDirectory: name.endsWith('/'),
    encrypted: (flags & FLAG_ENCRYPTED) !== 0
  };
}
