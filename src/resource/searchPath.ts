import os from 'node:os';
import path from 'node:path';

/** Inputs to {@link defaultSearchPath}; each defaults to the running process. */
export type SearchPathEnvironment = {
  env?: Readonly<Record<string, string | undefined>>;
  platform?: NodeJS.Platform;
  homedir?: string;
  /** Installation prefix whose `nltk_data`, `share/nltk_data` and `lib/nltk_data` are searched. */
  prefix?: string;
};

const POSIX_LOCATIONS = ['/usr/share/nltk_data', '/usr/local/share/nltk_data', '/usr/lib/nltk_data', '/usr/local/lib/nltk_data'];
const WINDOWS_LOCATIONS = ['C:\\nltk_data', 'D:\\nltk_data', 'E:\\nltk_data'];

/**
 * Build the default root list: `NLTK_DATA` entries, `~/nltk_data`, the
 * installation prefix, then the usual system locations for the platform.
 */
export function defaultSearchPath(environment: SearchPathEnvironment = {}): string[] {
  const env = environment.env ?? process.env;
  const platform = environment.platform ?? process.platform;
  const windows = platform === 'win32';
  const pathApi = windows ? path.win32 : path.posix;
  const delimiter = windows ? ';' : ':';
  const homedir = environment.homedir ?? os.homedir();
  const prefix = environment.prefix ?? path.dirname(path.dirname(process.execPath));

  const roots = (env['NLTK_DATA'] ?? '').split(delimiter).filter((entry) => entry.length > 0);
  if (homedir) {
    roots.push(pathApi.join(homedir, 'nltk_data'));
  }
  roots.push(
    pathApi.join(prefix, 'nltk_data'),
    pathApi.join(prefix, 'share', 'nltk_data'),
    pathApi.join(prefix, 'lib', 'nltk_data')
  );
  if (windows) {
    roots.push(pathApi.join(env['APPDATA'] ?? 'C:\\', 'nltk_data'), ...WINDOWS_LOCATIONS);
  } else {
    roots.push(...POSIX_LOCATIONS);
  }
  return roots;
}

/** Ordered, mutable list of roots searched by the loader. */
export class SearchPath {
  private entries: string[];

  constructor(roots: Iterable<string> = defaultSearchPath()) {
    this.entries = [...roots];
  }

  /** Snapshot of the roots in search order. */
  roots(): string[] {
    return [...this.entries];
  }

  prepend(...roots: string[]): this {
    this.entries = [...roots, ...this.entries];
    return this;
  }

  append(...roots: string[]): this {
    this.entries.push(...roots);
    return this;
  }

  /** Remove every occurrence of `root`; returns whether anything was removed. */
  remove(root: string): boolean {
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => entry !== root);
    return this.entries.length !== before;
  }

  get length(): number {
    return this.entries.length;
  }
}
