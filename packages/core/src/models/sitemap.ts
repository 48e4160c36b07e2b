import { normalizeLocation, parseWebUrl } from '../url.js';
import { InvalidUrlError } from '../exceptions.js';
import type { PageEntry } from './page-entry.js';

/**
 * Page entries keyed by location, in insertion order.
 *
 * Locations are normalized on the way in, so `https://example.com` and
 * `https://example.com/#top` address the same entry.
 */
export class Sitemap implements Iterable<PageEntry> {
  private readonly byLocation = new Map<string, PageEntry>();

  static from(entries: Iterable<PageEntry>): Sitemap {
    const sitemap = new Sitemap();
    for (const entry of entries) {
      sitemap.set(entry);
    }
    return sitemap;
  }

  get size(): number {
    return this.byLocation.size;
  }

  /** Inserts or replaces. A replaced location keeps its position. */
  set(entry: PageEntry): void {
    const location = normalizeLocation(entry.location);
    this.byLocation.set(location, { ...entry, location });
  }

  get(location: string): PageEntry | undefined {
    const key = toKey(location);
    return key === null ? undefined : this.byLocation.get(key);
  }

  has(location: string): boolean {
    return this.get(location) !== undefined;
  }

  entries(): PageEntry[] {
    return [...this.byLocation.values()];
  }

  locations(): string[] {
    return [...this.byLocation.keys()];
  }

  [Symbol.iterator](): Iterator<PageEntry> {
    return this.byLocation.values();
  }

  sortByUrl(): void {
    const sorted = this.entries().sort((a, b) =>
      a.location < b.location ? -1 : a.location > b.location ? 1 : 0,
    );
    this.byLocation.clear();
    for (const entry of sorted) {
      this.byLocation.set(entry.location, entry);
    }
  }

  /**
   * Copy with every location moved onto the scheme, host and port of
   * `origin`. Paths, queries and entry metadata are kept.
   */
  withDomain(origin: string): Sitemap {
    const target = parseWebUrl(origin);
    const moved = new Sitemap();
    for (const entry of this) {
      const url = new URL(entry.location);
      url.protocol = target.protocol;
      url.hostname = target.hostname;
      url.port = target.port;
      moved.set({ ...entry, location: url.href });
    }
    return moved;
  }

  equals(other: Sitemap): boolean {
    if (other.size !== this.size) return false;
    for (const entry of this) {
      const counterpart = other.get(entry.location);
      if (
        !counterpart ||
        counterpart.fingerprint !== entry.fingerprint ||
        counterpart.lastModified.getTime() !== entry.lastModified.getTime()
      ) {
        return false;
      }
    }
    return true;
  }
}

function toKey(location: string): string | null {
  try {
    return normalizeLocation(location);
  } catch (error) {
    if (error instanceof InvalidUrlError) return null;
    throw error;
  }
}
