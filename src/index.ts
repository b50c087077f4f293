export { ResourceLoader } from './resource/ResourceLoader.js';
export type {
  FormatValue,
  LoadOptions,
  ParserOptions,
  ResourceLoaderOptions,
  ResourceParser
} from './resource/ResourceLoader.js';
export { ResourceCache } from './resource/ResourceCache.js';
export { LazyResource } from './resource/LazyResource.js';
export type { LazyResourceState } from './resource/LazyResource.js';
export { AUTO_FORMATS, FORMATS, PARSER_FORMATS, inferFormat } from './resource/formats.js';
export type { ParserFormat, ResourceFormat } from './resource/formats.js';
export { find, splitArchiveName } from './resource/find.js';
export type { FindOptions } from './resource/find.js';
export {
  FileSystemPathPointer,
  GzipFileSystemPathPointer,
  PathPointer,
  ZipEntryPathPointer
} from './resource/PathPointer.js';
export {
  formatResourceUrl,
  normalizeResourceName,
  normalizeResourceUrl,
  parseResourceUrl,
  splitResourceUrl
} from './resource/url.js';
export type { ResourceProtocol, ResourceUrl } from './resource/url.js';
export { defaultSearchPath, SearchPath } from './resource/searchPath.js';
export type { SearchPathEnvironment } from './resource/searchPath.js';
export { ResourceError, formatResourceNotFound } from './resource/errors.js';
export type { ResourceErrorCode, ResourceErrorDetails } from './resource/errors.js';
export { CodedError } from './codedError.js';
export type { CodedErrorOptions, ErrorReport } from './codedError.js';

export { OpenOnDemandArchive } from './archive/OpenOnDemandArchive.js';
export type { OpenOnDemandArchiveOptions, ZipEntryRecord } from './archive/OpenOnDemandArchive.js';
export { openFileRandomAccess } from './reader/RandomAccess.js';
export type { RandomAccess, RandomAccessFactory } from './reader/RandomAccess.js';
export { ZipError } from './errors.js';
export type { ZipErrorCode, ZipErrorDetails, ZipWarning, ZipWarningCode } from './errors.js';

export { SeekableUnicodeStreamReader } from './text/SeekableUnicodeStreamReader.js';
export type { SeekableUnicodeStreamReaderOptions } from './text/SeekableUnicodeStreamReader.js';
export { CodecDecodeError, countCodePoints, getCodec, normalizeEncodingName } from './text/codecs.js';
export type { DecodeErrorMode, PartialDecode, TextCodec } from './text/codecs.js';
export { BufferByteStream, FileByteStream } from './streams/ByteStream.js';
export type { ByteStream, SeekWhence } from './streams/ByteStream.js';
export { BufferedGzipWriter } from './writer/BufferedGzipWriter.js';
export type { BufferedGzipWriterOptions } from './writer/BufferedGzipWriter.js';

export { DEFAULT_READER_LIMITS, resolveReaderLimits } from './limits.js';
export type { ReaderLimits } from './limits.js';
export type { ResourceEvent, ResourceEventKind, ResourceEventOptions } from './types.js';
