import { ResourceError } from '../resource/errors.js';

/** How malformed input is handled: raise, drop it, or substitute U+FFFD. */
export type DecodeErrorMode = 'strict' | 'ignore' | 'replace';

/** A strict decode failure over the byte span `[start, end)`. */
export class CodecDecodeError extends Error {
  constructor(
    readonly encoding: string,
    readonly start: number,
    readonly end: number,
    readonly reason: string
  ) {
    super(`'${encoding}' codec can't decode bytes in position ${start}-${end - 1}: ${reason}`);
    this.name = 'CodecDecodeError';
  }
}

/** Text decoded from a buffer that may end inside a character. */
export type PartialDecode = {
  text: string;
  /** Bytes consumed; the rest start a character that has not fully arrived. */
  consumed: number;
};

/** Stateless byte to text codec. */
export interface TextCodec {
  /** Canonical name, e.g. `utf-16-le`. */
  readonly name: string;
  /** Decode all of `bytes`; a truncated final character is malformed input. */
  decode(bytes: Uint8Array, errors?: DecodeErrorMode): string;
  /**
   * Decode `bytes`, holding back a malformed span that reaches the end of the
   * buffer instead of reporting it, since more bytes may complete it.
   */
  decodePartial(bytes: Uint8Array, errors?: DecodeErrorMode): PartialDecode;
}

type Step =
  | { ok: true; codePoint: number; next: number }
  | { ok: false; end: number; reason: string };

const TRUNCATED = 'unexpected end of data';
const REPLACEMENT = '\ufffd';

type StepFn = (bytes: Uint8Array, index: number) => Step;

function decodeSteps(
  name: string,
  bytes: Uint8Array,
  errors: DecodeErrorMode,
  step: StepFn,
  final: boolean,
  start = 0
): PartialDecode {
  let out = '';
  let i = start;
  while (i < bytes.length) {
    const result = step(bytes, i);
    if (result.ok) {
      out += String.fromCodePoint(result.codePoint);
      i = result.next;
      continue;
    }
    if (!final && result.end === bytes.length) {
      return { text: out, consumed: i };
    }
    if (errors === 'strict') {
      throw new CodecDecodeError(name, i, result.end, result.reason);
    }
    if (errors === 'replace') {
      out += REPLACEMENT;
    }
    i = result.end;
  }
  return { text: out, consumed: bytes.length };
}

function utf8Step(bytes: Uint8Array, i: number): Step {
  const lead = bytes[i]!;
  if (lead < 0x80) return { ok: true, codePoint: lead, next: i + 1 };

  let need: number;
  let low = 0x80;
  let high = 0xbf;
  let codePoint: number;
  if (lead >= 0xc2 && lead <= 0xdf) {
    need = 1;
    codePoint = lead & 0x1f;
  } else if (lead >= 0xe0 && lead <= 0xef) {
    need = 2;
    codePoint = lead & 0x0f;
    if (lead === 0xe0) low = 0xa0;
    if (lead === 0xed) high = 0x9f;
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    need = 3;
    codePoint = lead & 0x07;
    if (lead === 0xf0) low = 0x90;
    if (lead === 0xf4) high = 0x8f;
  } else {
    return { ok: false, end: i + 1, reason: 'invalid start byte' };
  }

  for (let k = 1; k <= need; k += 1) {
    if (i + k >= bytes.length) {
      return { ok: false, end: bytes.length, reason: TRUNCATED };
    }
    const byte = bytes[i + k]!;
    const min = k === 1 ? low : 0x80;
    const max = k === 1 ? high : 0xbf;
    if (byte < min || byte > max) {
      return { ok: false, end: i + k, reason: 'invalid continuation byte' };
    }
    codePoint = (codePoint << 6) | (byte & 0x3f);
  }
  return { ok: true, codePoint, next: i + need + 1 };
}

function latin1Step(bytes: Uint8Array, i: number): Step {
  return { ok: true, codePoint: bytes[i]!, next: i + 1 };
}

function asciiStep(bytes: Uint8Array, i: number): Step {
  const byte = bytes[i]!;
  if (byte < 0x80) return { ok: true, codePoint: byte, next: i + 1 };
  return { ok: false, end: i + 1, reason: 'ordinal not in range(128)' };
}

function utf16Step(littleEndian: boolean): StepFn {
  const unitAt = (bytes: Uint8Array, i: number): number =>
    littleEndian ? bytes[i]! | (bytes[i + 1]! << 8) : (bytes[i]! << 8) | bytes[i + 1]!;
  return (bytes, i) => {
    if (i + 1 >= bytes.length) {
      return { ok: false, end: bytes.length, reason: TRUNCATED };
    }
    const unit = unitAt(bytes, i);
    if (unit >= 0xdc00 && unit <= 0xdfff) {
      return { ok: false, end: i + 2, reason: 'illegal encoding' };
    }
    if (unit < 0xd800 || unit > 0xdbff) {
      return { ok: true, codePoint: unit, next: i + 2 };
    }
    if (i + 3 >= bytes.length) {
      return { ok: false, end: bytes.length, reason: TRUNCATED };
    }
    const low = unitAt(bytes, i + 2);
    if (low < 0xdc00 || low > 0xdfff) {
      return { ok: false, end: i + 2, reason: 'illegal UTF-16 surrogate' };
    }
    return { ok: true, codePoint: 0x10000 + ((unit - 0xd800) << 10) + (low - 0xdc00), next: i + 4 };
  };
}

function utf32Step(littleEndian: boolean): StepFn {
  return (bytes, i) => {
    if (i + 3 >= bytes.length) {
      return { ok: false, end: bytes.length, reason: TRUNCATED };
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset + i, 4);
    const codePoint = view.getUint32(0, littleEndian);
    if (codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
      return { ok: false, end: i + 4, reason: 'code point not in range' };
    }
    return { ok: true, codePoint, next: i + 4 };
  };
}

const utf8Fatal = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function stepCodec(name: string, step: StepFn): TextCodec {
  return {
    name,
    decode(bytes, errors = 'strict') {
      return decodeSteps(name, bytes, errors, step, true).text;
    },
    decodePartial(bytes, errors = 'strict') {
      return decodeSteps(name, bytes, errors, step, false);
    }
  };
}

const UTF8: TextCodec = {
  name: 'utf-8',
  decode(bytes, errors = 'strict') {
    try {
      return utf8Fatal.decode(bytes);
    } catch {
      return decodeSteps('utf-8', bytes, errors, utf8Step, true).text;
    }
  },
  decodePartial(bytes, errors = 'strict') {
    try {
      return { text: utf8Fatal.decode(bytes), consumed: bytes.length };
    } catch {
      return decodeSteps('utf-8', bytes, errors, utf8Step, false);
    }
  }
};

/** UTF-16/32 without an explicit byte order: honour a leading BOM, else little endian. */
function bomSniffingCodec(name: string, width: 2 | 4): TextCodec {
  const le = width === 2 ? utf16Step(true) : utf32Step(true);
  const be = width === 2 ? utf16Step(false) : utf32Step(false);
  const leBom = width === 2 ? UTF16_LE_BOM : UTF32_LE_BOM;
  const beBom = width === 2 ? UTF16_BE_BOM : UTF32_BE_BOM;
  const run = (bytes: Uint8Array, errors: DecodeErrorMode, final: boolean): PartialDecode => {
    if (hasPrefix(bytes, beBom)) return decodeSteps(name, bytes, errors, be, final, width);
    if (hasPrefix(bytes, leBom)) return decodeSteps(name, bytes, errors, le, final, width);
    return decodeSteps(name, bytes, errors, le, final);
  };
  return {
    name,
    decode(bytes, errors = 'strict') {
      return run(bytes, errors, true).text;
    },
    decodePartial(bytes, errors = 'strict') {
      return run(bytes, errors, false);
    }
  };
}

export const UTF8_BOM = Uint8Array.of(0xef, 0xbb, 0xbf);
export const UTF16_LE_BOM = Uint8Array.of(0xff, 0xfe);
export const UTF16_BE_BOM = Uint8Array.of(0xfe, 0xff);
export const UTF32_LE_BOM = Uint8Array.of(0xff, 0xfe, 0x00, 0x00);
export const UTF32_BE_BOM = Uint8Array.of(0x00, 0x00, 0xfe, 0xff);

function hasPrefix(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (bytes.length < prefix.length) return false;
  return prefix.every((byte, index) => bytes[index] === byte);
}

const CODECS = new Map<string, TextCodec>();

function register(codec: TextCodec, ...aliases: string[]): void {
  CODECS.set(normalizeEncodingName(codec.name), codec);
  for (const alias of aliases) {
    CODECS.set(normalizeEncodingName(alias), codec);
  }
}

register(UTF8, 'utf', 'u8');
register(stepCodec('latin-1', latin1Step), 'latin', 'l1', 'iso-8859-1', 'iso8859-1', '8859', 'cp819');
register(stepCodec('ascii', asciiStep), 'us-ascii', '646');
register(bomSniffingCodec('utf-16', 2), 'u16');
register(stepCodec('utf-16-le', utf16Step(true)), 'utf-16le', 'unicode-little-unmarked');
register(stepCodec('utf-16-be', utf16Step(false)), 'utf-16be', 'unicode-big-unmarked');
register(bomSniffingCodec('utf-32', 4), 'u32');
register(stepCodec('utf-32-le', utf32Step(true)));
register(stepCodec('utf-32-be', utf32Step(false)));

/** Lowercase and drop `-`, `_` and spaces: `UTF-16_LE` and `utf16le` match. */
export function normalizeEncodingName(name: string): string {
  return name.toLowerCase().replace(/[-_ ]/g, '');
}

export function getCodec(name: string): TextCodec {
  const codec = CODECS.get(normalizeEncodingName(name));
  if (!codec) {
    throw new ResourceError('RESOURCE_UNKNOWN_ENCODING', `Unknown encoding: ${name}`, {
      context: { encoding: name }
    });
  }
  return codec;
}

/** Number of Unicode code points in `text` (a surrogate pair counts once). */
export function countCodePoints(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i += 1) {
    const unit = text.charCodeAt(i);
    if (unit >= 0xdc00 && unit <= 0xdfff && i > 0) {
      const previous = text.charCodeAt(i - 1);
      if (previous >= 0xd800 && previous <= 0xdbff) continue;
    }
    count += 1;
  }
  return count;
}
