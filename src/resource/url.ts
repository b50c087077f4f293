import path from 'node:path';

/** How a resource URL is resolved. */
export type ResourceProtocol = 'file' | 'nltk' | 'http' | 'other';

/** A normalized resource URL, split into its parts. */
export type ResourceUrl = {
  protocol: ResourceProtocol;
  /** Scheme as written, lowercased (`file`, `nltk`, `https`, ...). */
  scheme: string;
  /** Posix-style path; directory-like names end in `/`. */
  path: string;
};

/**
 * Split `url` into scheme and path, or return `null` when it names no scheme.
 * A single letter before the colon is a drive letter, not a scheme.
 */
export function splitResourceUrl(url: string): { scheme: string; path: string } | null {
  const match = /^([A-Za-z][A-Za-z0-9+.-]*):(.*)$/s.exec(url);
  if (!match) return null;
  const [, scheme = '', rest = ''] = match;
  if (scheme.length === 1) return null;
  switch (scheme) {
    case 'nltk':
      return { scheme, path: rest };
    case 'file':
      return { scheme, path: rest.startsWith('/') ? `/${rest.replace(/^\/+/, '')}` : rest };
    default:
      return { scheme, path: rest.replace(/^\/{0,2}/, '') };
  }
}

function looksLikeDirectory(name: string): boolean {
  if (name.endsWith('/') || name.endsWith('\\') || name.endsWith(path.sep)) return true;
  const last = name.split(/[\\/]/).pop();
  return last === '.' || last === '..';
}

/**
 * Normalize a resource name to posix form. With `allowRelative` the name is
 * only cleaned up (`a/./b` → `a/b`); otherwise it is made absolute against
 * `relativePath` (default: the working directory). Directory-like names keep
 * a trailing `/`.
 */
export function normalizeResourceName(name: string, allowRelative = true, relativePath?: string): string {
  const isDirectory = looksLikeDirectory(name);
  let normalized = process.platform === 'win32' ? name.replace(/^\/+/, '') : name.replace(/^\/+/, '/');
  if (allowRelative) {
    normalized = path.normalize(normalized);
  } else {
    normalized = path.resolve(relativePath ?? process.cwd(), normalized);
  }
  normalized = normalized.split(path.sep).join('/').replace(/\\/g, '/');
  if (process.platform === 'win32' && path.isAbsolute(normalized)) {
    normalized = `/${normalized}`;
  }
  if (isDirectory && !normalized.endsWith('/')) {
    normalized += '/';
  }
  return normalized;
}

/**
 * Canonical string form of a resource URL. Names without a scheme use
 * `nltk:`; `file:` URLs and absolute `nltk:` names become `file://` plus an
 * absolute path.
 */
export function normalizeResourceUrl(url: string): string {
  const split = splitResourceUrl(url);
  const scheme = split?.scheme ?? 'nltk';
  const name = split?.path ?? url;

  if (scheme === 'nltk' && path.isAbsolute(name)) {
    return `file://${normalizeResourceName(name, false)}`;
  }
  if (scheme === 'file') {
    return `file://${normalizeResourceName(name, false)}`;
  }
  if (scheme === 'nltk') {
    return `nltk:${normalizeResourceName(name, true)}`;
  }
  return `${scheme}://${name}`;
}

function classify(scheme: string): ResourceProtocol {
  switch (scheme.toLowerCase()) {
    case 'file':
      return 'file';
    case 'nltk':
      return 'nltk';
    case 'http':
    case 'https':
      return 'http';
    default:
      return 'other';
  }
}

/** Normalize `url` and split it into a {@link ResourceUrl}. */
export function parseResourceUrl(url: string): ResourceUrl {
  const normalized = normalizeResourceUrl(url);
  const split = splitResourceUrl(normalized);
  if (!split) {
    return { protocol: 'nltk', scheme: 'nltk', path: normalized };
  }
  return { protocol: classify(split.scheme), scheme: split.scheme.toLowerCase(), path: split.path };
}

export function formatResourceUrl(url: ResourceUrl): string {
  switch (url.protocol) {
    case 'file':
      return `file://${url.path}`;
    case 'nltk':
      return `nltk:${url.path}`;
    default:
      return `${url.scheme}://${url.path}`;
  }
}

/** Filesystem path for the path of a `file://` URL (`/C:/x` → `C:/x` on Windows). */
export function fileUrlPathToFsPath(urlPath: string): string {
  if (process.platform === 'win32' && /^\/[A-Za-z]:/.test(urlPath)) {
    return urlPath.slice(1);
  }
  return urlPath;
}
