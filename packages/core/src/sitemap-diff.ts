import type { PageEntry } from './models/page-entry.js';
import type { Sitemap } from './models/sitemap.js';

export interface SitemapDiff {
  readonly added: readonly string[];
  readonly changed: readonly string[];
  readonly unchanged: readonly string[];
  readonly removed: readonly string[];
}

/**
 * True only when both sides carry a fingerprint and they are identical.
 * A missing fingerprint on either side counts as a change.
 */
export function hasSameContent(current: PageEntry, saved: PageEntry): boolean {
  return (
    current.fingerprint !== null &&
    saved.fingerprint !== null &&
    current.fingerprint === saved.fingerprint
  );
}

export function diffSitemaps(current: Sitemap, saved: Sitemap): SitemapDiff {
  const added: string[] = [];
  const changed: string[] = [];
  const unchanged: string[] = [];
  const removed: string[] = [];

  for (const entry of current) {
    const savedEntry = saved.get(entry.location);
    if (!savedEntry) {
      added.push(entry.location);
    } else if (hasSameContent(entry, savedEntry)) {
      unchanged.push(entry.location);
    } else {
      changed.push(entry.location);
    }
  }

  for (const entry of saved) {
    if (!current.has(entry.location)) {
      removed.push(entry.location);
    }
  }

  return {
    added: added.sort(),
    changed: changed.sort(),
    unchanged: unchanged.sort(),
    removed: removed.sort(),
  };
}
