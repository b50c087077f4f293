import { readUint16LE, readUint32LE, readUint64LE } from './binary.js';

const ZIP64_EXTRA_ID = 0x0001;

/** Which central directory fields hold the 0xffff/0xffffffff overflow marker. */
export type Zip64Overflow = {
  uncompressed: boolean;
  compressed: boolean;
  offset: boolean;
  diskStart: boolean;
};

export type Zip64Values = {
  uncompressedSize?: bigint;
  compressedSize?: bigint;
  offset?: bigint;
  diskStart?: number;
};

/** Payload of the first extra field with tag `id`; a truncated block ends the walk. */
export function findExtraField(extra: Uint8Array, id: number): Uint8Array | undefined {
  let pos = 0;
  while (pos + 4 <= extra.length) {
    const end = pos + 4 + readUint16LE(extra, pos + 2);
    if (end > extra.length) return undefined;
    if (readUint16LE(extra, pos) === id) return extra.subarray(pos + 4, end);
    pos = end;
  }
  return undefined;
}

/**
 * Real values of the overflowed fields, which the ZIP64 extra field stores in
 * a fixed order and only for the fields that overflowed. `null` when the
 * field is missing or too short.
 */
export function readZip64Extra(extra: Uint8Array, overflow: Zip64Overflow): Zip64Values | null {
  const data = findExtraField(extra, ZIP64_EXTRA_ID);
  if (!data) return null;
  const needed =
    (overflow.uncompressed ? 8 : 0) + (overflow.compressed ? 8 : 0) + (overflow.offset ? 8 : 0) + (overflow.diskStart ? 4 : 0);
  if (data.length < needed) return null;

  let pos = 0;
  const take64 = (): bigint => {
    const value = readUint64LE(data, pos);
    pos += 8;
    return value;
  };
  return {
    ...(overflow.uncompressed ? { uncompressedSize: take64() } : {}),
    ...(overflow.compressed ? { compressedSize: take64() } : {}),
    ...(overflow.offset ? { offset: take64() } : {}),
    ...(overflow.diskStart ? { diskStart: readUint32LE(data, pos) } : {})
  };
}
