import { CodedError, type CodedErrorOptions } from './codedError.js';

/** Stable ZIP error codes. */
export type ZipErrorCode =
  | 'ZIP_ARCHIVE_CONSTRUCT_FAILED'
  | 'ZIP_ENTRY_NOT_FOUND'
  | 'ZIP_EOCD_NOT_FOUND'
  | 'ZIP_BAD_EOCD'
  | 'ZIP_BAD_ZIP64'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_TRUNCATED'
  | 'ZIP_INVALID_SIGNATURE'
  | 'ZIP_UNSUPPORTED_METHOD'
  | 'ZIP_UNSUPPORTED_ENCRYPTION'
  | 'ZIP_BAD_DATA'
  | 'ZIP_BAD_CRC'
  | 'ZIP_LIMIT_EXCEEDED';

/** Serialized ZIP error details; offsets become decimal strings. */
export type ZipErrorDetails = {
  entryName?: string;
  archivePath?: string;
  method?: number;
  offset?: string;
};

/** Error thrown for ZIP parsing and entry lookup failures. */
export class ZipError extends CodedError<ZipErrorCode, ZipErrorDetails> {
  /** Entry name related to the error, if available. */
  readonly entryName?: string | undefined;
  /** Archive file related to the error, if available. */
  readonly archivePath?: string | undefined;
  /** Compression method related to the error, if available. */
  readonly method?: number | undefined;
  /** Offset (in bytes) related to the error, if available. */
  readonly offset?: bigint | undefined;

  constructor(
    code: ZipErrorCode,
    message: string,
    options?: CodedErrorOptions & {
      entryName?: string | undefined;
      archivePath?: string | undefined;
      method?: number | undefined;
      offset?: bigint | undefined;
    }
  ) {
    super('ZipError', code, message, options);
    this.entryName = options?.entryName;
    this.archivePath = options?.archivePath;
    this.method = options?.method;
    this.offset = options?.offset;
  }

  protected details(): ZipErrorDetails {
    return {
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
      ...(this.archivePath !== undefined ? { archivePath: this.archivePath } : {}),
      ...(this.method !== undefined ? { method: this.method } : {}),
      ...(this.offset !== undefined ? { offset: this.offset.toString() } : {})
    };
  }
}

/** Non-fatal ZIP warning codes. */
export type ZipWarningCode =
  | 'ZIP_MULTIPLE_EOCD'
  | 'ZIP_BAD_EOCD'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_INVALID_ENCODING';

/** Non-fatal warning produced while parsing ZIP structures. */
export type ZipWarning = {
  code: ZipWarningCode;
  message: string;
  entryName?: string;
};
