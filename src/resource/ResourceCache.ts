/**
 * Values loaded by a `ResourceLoader`, keyed by normalized URL and format.
 * Entries live until `delete()` or `clear()`.
 */
export class ResourceCache {
  private readonly entries = new Map<string, unknown>();

  private static key(url: string, format: string): string {
    return `${format}\u0000${url}`;
  }

  get(url: string, format: string): unknown {
    return this.entries.get(ResourceCache.key(url, format));
  }

  has(url: string, format: string): boolean {
    return this.entries.has(ResourceCache.key(url, format));
  }

  /** Store `value`; `null` and `undefined` are not cached and return false. */
  set(url: string, format: string, value: unknown): boolean {
    if (value === null || value === undefined) return false;
    this.entries.set(ResourceCache.key(url, format), value);
    return true;
  }

  delete(url: string, format: string): boolean {
    return this.entries.delete(ResourceCache.key(url, format));
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
