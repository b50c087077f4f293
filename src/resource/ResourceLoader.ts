import { closeSync, existsSync, openSync, writeSync } from 'node:fs';
import path from 'node:path';
import { deserialize } from 'node:v8';
import * as yaml from 'js-yaml';
import type { ByteStream } from '../streams/ByteStream.js';
import { CodecDecodeError, getCodec } from '../text/codecs.js';
import { splitLines } from '../text/lines.js';
import type { ResourceEvent, ResourceEventOptions } from '../types.js';
import { ResourceError } from './errors.js';
import { find, type FindOptions } from './find.js';
import { inferFormat, isParserFormat, isResourceFormat, type ParserFormat, type ResourceFormat } from './formats.js';
import { LazyResource } from './LazyResource.js';
import type { PathPointer } from './PathPointer.js';
import { ResourceCache } from './ResourceCache.js';
import { defaultSearchPath, SearchPath } from './searchPath.js';
import { fileUrlPathToFsPath, normalizeResourceUrl, parseResourceUrl, type ResourceUrl } from './url.js';

/** Options handed to an injected parser, plus the declared encoding. */
export type ParserOptions = { encoding?: string | undefined } & Readonly<Record<string, unknown>>;

/** Parses decoded text into a value for one of the grammar or logic formats. */
export type ResourceParser = (text: string, options: ParserOptions) => unknown;

/** Value type produced by each format. */
export type FormatValue = {
  raw: Uint8Array;
  text: string;
  json: unknown;
  yaml: unknown;
  v8: unknown;
  cfg: unknown;
  pcfg: unknown;
  fcfg: unknown;
  fol: unknown;
  logic: unknown;
  val: unknown;
};

export interface ResourceLoaderOptions extends ResourceEventOptions {
  /** Cache shared with other loaders; a private one is created when absent. */
  cache?: ResourceCache;
  /** Roots for `nltk:` URLs (default: {@link defaultSearchPath}). */
  searchPath?: SearchPath | readonly string[];
  parsers?: Partial<Record<ParserFormat, ResourceParser>>;
  /** Opens URLs with schemes other than `nltk:` and `file:`. */
  openUrl?: (url: ResourceUrl) => ByteStream;
  /** Passed to {@link find}. */
  find?: FindOptions;
}

export type LoadOptions = {
  /** A key of `FORMATS`, or `auto` (default) to infer it from the extension. */
  format?: ResourceFormat | 'auto' | (string & {});
  /** Return and store cached values (default: true). */
  cache?: boolean;
  /**
   * Encoding of text formats. Without one, UTF-8 is tried and Latin-1 is
   * used when the bytes are not valid UTF-8.
   */
  encoding?: string;
  /** Extra options forwarded to an injected parser. */
  parserOptions?: Readonly<Record<string, unknown>>;
};

const COPY_BLOCK_BYTES = 64 * 1024;

/**
 * Loads resources by URL: `nltk:` names are resolved against the search path,
 * `file:` URLs name local files, anything else goes through `openUrl`.
 * Loaded values are cached per normalized URL and format.
 */
export class ResourceLoader {
  readonly cache: ResourceCache;
  readonly searchPath: SearchPath;
  private readonly parsers: Partial<Record<ParserFormat, ResourceParser>>;
  private readonly openUrl: ((url: ResourceUrl) => ByteStream) | undefined;
  private readonly onEvent: ((event: ResourceEvent) => void) | undefined;
  private readonly findOptions: FindOptions;

  constructor(options: ResourceLoaderOptions = {}) {
    this.cache = options.cache ?? new ResourceCache();
    this.searchPath =
      options.searchPath instanceof SearchPath
        ? options.searchPath
        : new SearchPath(options.searchPath ?? defaultSearchPath());
    this.parsers = { ...options.parsers };
    this.openUrl = options.openUrl;
    this.onEvent = options.onEvent;
    this.findOptions = options.find ?? {};
  }

  /** Resolve a resource name against this loader's search path. */
  find(resourceName: string): PathPointer {
    return find(resourceName, this.searchPath.roots(), this.findOptions);
  }

  /** Open the bytes of a resource; the caller closes the stream. */
  open(url: string): ByteStream {
    const parsed = parseResourceUrl(url);
    switch (parsed.protocol) {
      case 'nltk':
        return find(parsed.path, [...this.searchPath.roots(), ''], this.findOptions).open();
      case 'file':
        return find(fileUrlPathToFsPath(parsed.path), [''], this.findOptions).open();
      case 'http':
      case 'other': {
        if (!this.openUrl) {
          throw new ResourceError('RESOURCE_UNSUPPORTED_PROTOCOL', `No handler for ${parsed.scheme}: URLs`, {
            resourceName: normalizeResourceUrl(url),
            context: { scheme: parsed.scheme }
          });
        }
        return this.openUrl(parsed);
      }
      default: {
        const exhaustive: never = parsed.protocol;
        return exhaustive;
      }
    }
  }

  /**
   * Load a resource and convert it according to `format`.
   *
   * @throws {ResourceError} `RESOURCE_UNKNOWN_FORMAT`, `RESOURCE_PARSER_UNAVAILABLE`,
   * `RESOURCE_NOT_FOUND`, `RESOURCE_UNSUPPORTED_PROTOCOL` or `RESOURCE_DECODE_ERROR`.
   */
  load<F extends ResourceFormat>(url: string, options: LoadOptions & { format: F }): FormatValue[F];
  load(url: string, options?: LoadOptions): unknown;
  load(url: string, options: LoadOptions = {}): unknown {
    const normalized = normalizeResourceUrl(url);
    const format = this.resolveFormat(normalized, options.format ?? 'auto');
    const useCache = options.cache ?? true;

    if (useCache) {
      const cached = this.cache.get(normalized, format);
      if (cached !== undefined) {
        this.emit({ kind: 'cache-hit', url: normalized, format });
        return cached;
      }
    }

    this.emit({ kind: 'load', url: normalized, format });
    const stream = this.open(normalized);
    let value: unknown;
    try {
      value = this.convert(stream, format, normalized, options);
    } finally {
      stream.close();
    }

    if (useCache && this.cache.set(normalized, format, value)) {
      this.emit({ kind: 'cache-store', url: normalized, format });
    }
    return value;
  }

  /** A handle that loads `url` on first use. */
  lazy<F extends ResourceFormat>(url: string, options: LoadOptions & { format: F }): LazyResource<FormatValue[F]>;
  lazy(url: string, options?: LoadOptions): LazyResource<unknown>;
  lazy(url: string, options: LoadOptions = {}): LazyResource<unknown> {
    return new LazyResource(normalizeResourceUrl(url), () => this.load(url, options));
  }

  /**
   * Copy a resource into a local file (default: the last segment of the URL
   * in the working directory). An existing file is never overwritten.
   *
   * @returns The absolute path written.
   */
  retrieve(url: string, filename?: string): string {
    const normalized = normalizeResourceUrl(url);
    const target = filename ?? normalized.slice(normalized.lastIndexOf('/') + 1);
    if (!target) {
      throw new ResourceError('RESOURCE_UNSUPPORTED_OPERATION', `Cannot derive a file name from ${normalized}`, {
        resourceName: normalized
      });
    }
    const absolute = path.resolve(target);
    if (existsSync(absolute)) {
      throw new ResourceError('RESOURCE_ALREADY_EXISTS', `File ${JSON.stringify(absolute)} already exists`, {
        resourceName: normalized,
        context: { filename: absolute }
      });
    }

    this.emit({ kind: 'retrieve', url: normalized, filename: absolute });
    const input = this.open(normalized);
    try {
      const fd = openSync(absolute, 'wx');
      try {
        while (true) {
          const block = input.read(COPY_BLOCK_BYTES);
          if (block.length === 0) break;
          writeSync(fd, block);
        }
      } finally {
        closeSync(fd);
      }
    } finally {
      input.close();
    }
    return absolute;
  }

  /** Lines of a text resource, without blank lines and lines starting with `escape`. */
  grammarLines(url: string, escape = '##'): string[] {
    const text = this.load(url, { format: 'text', cache: false });
    return splitLines(text).filter((line) => line.length > 0 && !line.startsWith(escape));
  }

  clearCache(): void {
    this.cache.clear();
  }

  private resolveFormat(url: string, requested: string): ResourceFormat {
    let format: string;
    if (requested === 'auto') {
      const inferred = inferFormat(url);
      if (!inferred) {
        throw new ResourceError(
          'RESOURCE_UNKNOWN_FORMAT',
          `Could not determine format for ${url} based on its file extension; pass the format explicitly`,
          { resourceName: url }
        );
      }
      format = inferred;
    } else {
      format = requested;
    }

    if (!isResourceFormat(format)) {
      throw new ResourceError('RESOURCE_UNKNOWN_FORMAT', `Unknown format type: ${format}`, {
        resourceName: url,
        context: { format }
      });
    }
    if (isParserFormat(format) && !this.parsers[format]) {
      throw new ResourceError('RESOURCE_PARSER_UNAVAILABLE', `No parser registered for the ${format} format`, {
        resourceName: url,
        context: { format }
      });
    }
    return format;
  }

  private convert(stream: ByteStream, format: ResourceFormat, url: string, options: LoadOptions): unknown {
    const bytes = stream.read();
    switch (format) {
      case 'raw':
        return bytes;
      case 'v8':
        return this.parseWith(url, format, () => deserialize(bytes));
      case 'json': {
        const text = this.decodeText(bytes, url, options.encoding);
        return this.parseWith(url, format, () => JSON.parse(text));
      }
      case 'yaml': {
        const text = this.decodeText(bytes, url, options.encoding);
        return this.parseWith(url, format, () => yaml.load(text));
      }
      case 'text':
        return this.decodeText(bytes, url, options.encoding);
      case 'cfg':
      case 'pcfg':
      case 'fcfg':
      case 'fol':
      case 'logic':
      case 'val': {
        const parser = this.parsers[format];
        if (!parser) {
          throw new ResourceError('RESOURCE_PARSER_UNAVAILABLE', `No parser registered for the ${format} format`, {
            resourceName: url
          });
        }
        const text = this.decodeText(bytes, url, options.encoding);
        return parser(text, { ...options.parserOptions, encoding: options.encoding });
      }
      default: {
        const exhaustive: never = format;
        return exhaustive;
      }
    }
  }

  private decodeText(bytes: Uint8Array, url: string, encoding: string | undefined): string {
    if (encoding !== undefined) {
      const codec = getCodec(encoding);
      try {
        return codec.decode(bytes, 'strict');
      } catch (err) {
        if (err instanceof CodecDecodeError) {
          throw new ResourceError('RESOURCE_DECODE_ERROR', `Cannot decode ${url} as ${encoding}: ${err.message}`, {
            resourceName: url,
            cause: err,
            context: { encoding, start: String(err.start), end: String(err.end) }
          });
        }
        throw err;
      }
    }
    try {
      return getCodec('utf-8').decode(bytes, 'strict');
    } catch (err) {
      if (err instanceof CodecDecodeError) {
        return getCodec('latin-1').decode(bytes);
      }
      throw err;
    }
  }

  private parseWith(url: string, format: ResourceFormat, parse: () => unknown): unknown {
    try {
      return parse();
    } catch (err) {
      throw new ResourceError('RESOURCE_DECODE_ERROR', `Cannot parse ${url} as ${format}`, {
        resourceName: url,
        cause: err,
        context: { format }
      });
    }
  }

  private emit(event: ResourceEvent): void {
    this.onEvent?.(event);
  }
}
