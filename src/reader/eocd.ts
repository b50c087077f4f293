import { readUint16LE, readUint32LE, readUint64LE, toSafeNumber } from '../binary.js';
import { ZipError, type ZipWarning } from '../errors.js';
import type { RandomAccess } from './RandomAccess.js';

const EOCD_SIGNATURE = 0x06054b50;
const EOCD_MIN_SIZE = 22;
const ZIP64_EOCD_SIGNATURE = 0x06064b50;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;

export interface EocdResult {
  eocdOffset: number;
  cdOffset: number;
  cdSize: number;
  totalEntries: number;
  zip64: boolean;
  warnings: ZipWarning[];
}

export interface FindEocdOptions {
  maxSearchBytes: number;
  maxCentralDirectoryBytes: number;
  maxEntries: number;
}

export function findEocd(reader: RandomAccess, options: FindEocdOptions): EocdResult {
  const warnings: ZipWarning[] = [];
  const size = reader.size();
  if (size < EOCD_MIN_SIZE) {
    throw new ZipError('ZIP_EOCD_NOT_FOUND', 'File too small for an end of central directory record');
  }
  // The record sits in the last 64KiB (maximum comment) plus its fixed size.
  const searchSize = Math.min(size, Math.max(EOCD_MIN_SIZE, options.maxSearchBytes));
  const searchStart = size - searchSize;
  const buffer = reader.read(searchStart, searchSize);

  const candidates: number[] = [];
  for (let i = buffer.length - EOCD_MIN_SIZE; i >= 0; i -= 1) {
    if (readUint32LE(buffer, i) === EOCD_SIGNATURE) {
      candidates.push(i);
    }
  }
  if (candidates.length === 0) {
    throw new ZipError('ZIP_EOCD_NOT_FOUND', 'End of central directory not found');
  }
  if (candidates.length > 1) {
    warnings.push({
      code: 'ZIP_MULTIPLE_EOCD',
      message: 'Multiple end of central directory records found; using the last one'
    });
  }

  const index = candidates[0]!;
  const eocdOffset = searchStart + index;
  const commentLength = readUint16LE(buffer, index + 20);
  if (searchStart + index + EOCD_MIN_SIZE + commentLength !== size) {
    warnings.push({
      code: 'ZIP_BAD_EOCD',
      message: 'End of central directory does not end at EOF'
    });
  }

  const totalEntries16 = readUint16LE(buffer, index + 10);
  const cdSize32 = readUint32LE(buffer, index + 12);
  const cdOffset32 = readUint32LE(buffer, index + 16);

  const needsZip64 = totalEntries16 === 0xffff || cdSize32 === 0xffffffff || cdOffset32 === 0xffffffff;
  if (!needsZip64) {
    const result: EocdResult = {
      eocdOffset,
      cdOffset: cdOffset32,
      cdSize: cdSize32,
      totalEntries: totalEntries16,
      zip64: false,
      warnings
    };
    enforceLimits(result, options);
    return result;
  }

  if (eocdOffset < 20) {
    throw new ZipError('ZIP_BAD_ZIP64', 'Missing ZIP64 end of central directory locator');
  }
  const locator = reader.read(eocdOffset - 20, 20);
  if (locator.length < 20 || readUint32LE(locator, 0) !== ZIP64_LOCATOR_SIGNATURE) {
    throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 locator signature missing');
  }
  const zip64EocdOffset = toSafeNumber(readUint64LE(locator, 8), 'ZIP64 end record offset');
  const header = reader.read(zip64EocdOffset, 56);
  if (header.length < 56 || readUint32LE(header, 0) !== ZIP64_EOCD_SIGNATURE) {
    throw new ZipError('ZIP_BAD_ZIP64', 'ZIP64 end of central directory signature missing');
  }
  const result: EocdResult = {
    eocdOffset,
    cdOffset: toSafeNumber(readUint64LE(header, 48), 'Central directory offset'),
    cdSize: toSafeNumber(readUint64LE(header, 40), 'Central directory size'),
    totalEntries: toSafeNumber(readUint64LE(header, 32), 'Entry count'),
    zip64: true,
    warnings
  };
  enforceLimits(result, options);
  return result;
}

function enforceLimits(result: EocdResult, options: FindEocdOptions): void {
  if (result.cdSize > options.maxCentralDirectoryBytes) {
    throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Central directory size exceeds limit', {
      context: {
        requiredCentralDirectoryBytes: String(result.cdSize),
        limitCentralDirectoryBytes: String(options.maxCentralDirectoryBytes)
      }
    });
  }
  if (result.totalEntries > options.maxEntries) {
    throw new ZipError('ZIP_LIMIT_EXCEEDED', 'Entry count exceeds limit', {
      context: {
        requiredEntries: String(result.totalEntries),
        limitEntries: String(options.maxEntries)
      }
    });
  }
}
