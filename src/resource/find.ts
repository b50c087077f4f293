import { statSync } from 'node:fs';
import path from 'node:path';
import { OpenOnDemandArchive, type OpenOnDemandArchiveOptions } from '../archive/OpenOnDemandArchive.js';
import { isGzipName } from '../compression/gzip.js';
import { ZipError } from '../errors.js';
import { ResourceError } from './errors.js';
import { FileSystemPathPointer, GzipFileSystemPathPointer, ZipEntryPathPointer, type PathPointer } from './PathPointer.js';
import { normalizeResourceName } from './url.js';

/** Options for {@link find}. */
export interface FindOptions {
  /** Passed to every archive opened while probing zip roots and zip names. */
  archive?: OpenOnDemandArchiveOptions;
}

type ArchiveSplit = { archivePart: string; entryPart: string };

/** Split at the first path segment that ends in `.zip`: `a/b.zip/c/d` → `a/b.zip`, `c/d`. */
export function splitArchiveName(resourceName: string): ArchiveSplit | null {
  const segments = resourceName.split('/');
  const index = segments.findIndex((segment) => segment.endsWith('.zip'));
  if (index < 0) return null;
  return {
    archivePart: segments.slice(0, index + 1).join('/'),
    entryPart: segments.slice(index + 1).join('/')
  };
}

function isFile(candidate: string): boolean {
  return statSync(candidate, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isDirectory(candidate: string): boolean {
  return statSync(candidate, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

function exists(candidate: string): boolean {
  return statSync(candidate, { throwIfNoEntry: false }) !== undefined;
}

function toFsPath(root: string, resourcePath: string): string {
  const native = resourcePath.split('/').join(path.sep);
  return root ? path.join(root, native) : native;
}

/** Entry pointer, or `null` when the archive opens but lacks the entry. */
function probeArchive(archivePath: string, entry: string, options: FindOptions): ZipEntryPathPointer | null {
  const archive = new OpenOnDemandArchive(archivePath, options.archive);
  try {
    return new ZipEntryPathPointer(archive, entry);
  } catch (err) {
    if (err instanceof ZipError && err.code === 'ZIP_ENTRY_NOT_FOUND') return null;
    throw err;
  }
}

function searchRoots(resourceName: string, roots: readonly string[], options: FindOptions): PathPointer | null {
  const split = splitArchiveName(resourceName);
  for (const root of roots) {
    if (root && root.endsWith('.zip') && isFile(root)) {
      const pointer = probeArchive(root, resourceName, options);
      if (pointer) return pointer;
      continue;
    }
    if (root && !isDirectory(root)) continue;

    if (!split) {
      const candidate = toFsPath(root, resourceName);
      if (exists(candidate)) {
        return isGzipName(candidate) ? new GzipFileSystemPathPointer(candidate) : new FileSystemPathPointer(candidate);
      }
      continue;
    }

    const archivePath = toFsPath(root, split.archivePart);
    if (isFile(archivePath)) {
      const pointer = probeArchive(archivePath, split.entryPart, options);
      if (pointer) return pointer;
    }
  }
  return null;
}

function packageNameOf(resourceName: string): string | undefined {
  const segment = resourceName.split('/')[1];
  if (!segment) return undefined;
  return segment.endsWith('.zip') ? segment.slice(0, -'.zip'.length) : segment;
}

/**
 * Resolve `resourceName` (a posix-style relative name such as
 * `corpora/brown/ca01`) against `roots`, which may be directories, zip files,
 * or `''` for names that are absolute or relative to the working directory.
 *
 * When nothing matches and the name has no `.zip` segment, each segment is in
 * turn assumed to be a zip of the same name: `corpora/x/y` is retried as
 * `corpora.zip/corpora/x/y`, `corpora/x.zip/x/y` and `corpora/x/y.zip/y`.
 * Directories inside archives are only found when the name ends in `/`.
 *
 * @throws {ResourceError} `RESOURCE_NOT_FOUND` when every root and fallback misses.
 * @throws {ZipError} `ZIP_ARCHIVE_CONSTRUCT_FAILED` when a candidate archive is unreadable.
 */
export function find(resourceName: string, roots: readonly string[], options: FindOptions = {}): PathPointer {
  const name = normalizeResourceName(resourceName, true);

  const direct = searchRoots(name, roots, options);
  if (direct) return direct;

  if (!splitArchiveName(name)) {
    const pieces = name.split('/');
    for (let i = 0; i < pieces.length; i += 1) {
      const piece = pieces[i];
      if (!piece) continue;
      const modified = [...pieces.slice(0, i), `${piece}.zip`, ...pieces.slice(i)].join('/');
      const pointer = searchRoots(modified, roots, options);
      if (pointer) return pointer;
    }
  }

  throw new ResourceError('RESOURCE_NOT_FOUND', `Resource ${JSON.stringify(name)} not found`, {
    resourceName: name,
    searchedRoots: roots,
    packageName: packageNameOf(name)
  });
}
