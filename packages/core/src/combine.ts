import { Sitemap } from './models/sitemap.js';
import { hasSameContent } from './sitemap-diff.js';

/**
 * Merges a freshly crawled sitemap with the previously published one.
 *
 * Pages whose fingerprint is unchanged keep the published `lastModified`;
 * every other page keeps its provisional crawl timestamp. Pages that only
 * exist in `saved` are dropped. Neither input is modified.
 */
export function combineSitemaps(current: Sitemap, saved: Sitemap): Sitemap {
  const combined = new Sitemap();
  for (const entry of current) {
    const savedEntry = saved.get(entry.location);
    if (savedEntry && hasSameContent(entry, savedEntry)) {
      combined.set({ ...entry, lastModified: savedEntry.lastModified });
    } else {
      combined.set(entry);
    }
  }
  return combined;
}
