import { readUint16LE, readUint32LE } from '../binary.js';
import { ZipError } from '../errors.js';
import type { RandomAccess } from './RandomAccess.js';
import type { ZipEntryRecord } from './centralDirectory.js';

const LFH_SIGNATURE = 0x04034b50;
const LFH_SIZE = 30;

/** Offset of the entry's data, past its local header. */
export function readLocalDataOffset(reader: RandomAccess, entry: ZipEntryRecord): number {
  const header = reader.read(entry.offset, LFH_SIZE);
  if (header.length < LFH_SIZE || readUint32LE(header, 0) !== LFH_SIGNATURE) {
    throw new ZipError('ZIP_INVALID_SIGNATURE', 'Invalid local file header signature', {
      entryName: entry.name,
      offset: BigInt(entry.offset)
    });
  }
  const nameLen = readUint16LE(header, 26);
  const extraLen = readUint16LE(header, 28);
  return entry.offset + LFH_SIZE + nameLen + extraLen;
}
