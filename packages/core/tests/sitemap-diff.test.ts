import { describe, expect, it } from 'vitest';
import type { PageEntry } from '../src/models/page-entry.js';
import { Sitemap } from '../src/models/sitemap.js';
import { diffSitemaps, hasSameContent } from '../src/sitemap-diff.js';

const T0 = new Date(Date.UTC(2023, 7, 13, 11, 30, 46));

function page(path: string, fingerprint: string | null): PageEntry {
  return { location: `https://example.com${path}`, fingerprint, lastModified: T0 };
}

describe('hasSameContent', () => {
  it('is true for equal fingerprints', () => {
    expect(hasSameContent(page('/', 'aaa'), page('/', 'aaa'))).toBe(true);
  });

  it('is false for different fingerprints', () => {
    expect(hasSameContent(page('/', 'aaa'), page('/', 'bbb'))).toBe(false);
  });

  it('does not fold case', () => {
    expect(hasSameContent(page('/', 'abc'), page('/', 'ABC'))).toBe(false);
  });

  it('is false when either side has no fingerprint', () => {
    expect(hasSameContent(page('/', null), page('/', 'aaa'))).toBe(false);
    expect(hasSameContent(page('/', 'aaa'), page('/', null))).toBe(false);
    expect(hasSameContent(page('/', null), page('/', null))).toBe(false);
  });
});

describe('diffSitemaps', () => {
  it('treats all pages as added when nothing was published', () => {
    const current = Sitemap.from([page('/', 'aaa'), page('/b', 'bbb')]);
    const diff = diffSitemaps(current, new Sitemap());
    expect(diff.added).toEqual(['https://example.com/', 'https://example.com/b']);
    expect(diff.changed).toEqual([]);
    expect(diff.unchanged).toEqual([]);
    expect(diff.removed).toEqual([]);
  });

  it('detects no changes', () => {
    const current = Sitemap.from([page('/', 'aaa'), page('/b', 'bbb')]);
    const saved = Sitemap.from([page('/', 'aaa'), page('/b', 'bbb')]);
    const diff = diffSitemaps(current, saved);
    expect(diff.unchanged).toEqual(['https://example.com/', 'https://example.com/b']);
    expect(diff.added).toEqual([]);
    expect(diff.changed).toEqual([]);
  });

  it('detects content changes', () => {
    const current = Sitemap.from([page('/', 'aaa'), page('/b', 'CHANGED')]);
    const saved = Sitemap.from([page('/', 'aaa'), page('/b', 'bbb')]);
    const diff = diffSitemaps(current, saved);
    expect(diff.changed).toEqual(['https://example.com/b']);
    expect(diff.unchanged).toEqual(['https://example.com/']);
  });

  it('counts a missing saved fingerprint as changed', () => {
    const current = Sitemap.from([page('/', 'aaa')]);
    const saved = Sitemap.from([page('/', null)]);
    expect(diffSitemaps(current, saved).changed).toEqual(['https://example.com/']);
  });

  it('detects removed pages', () => {
    const current = Sitemap.from([page('/', 'aaa')]);
    const saved = Sitemap.from([page('/', 'aaa'), page('/gone', 'bbb')]);
    const diff = diffSitemaps(current, saved);
    expect(diff.removed).toEqual(['https://example.com/gone']);
    expect(diff.unchanged).toEqual(['https://example.com/']);
  });

  it('sorts every list', () => {
    const current = Sitemap.from([page('/z', 'zzz'), page('/m', 'mmm'), page('/a', 'aaa')]);
    const diff = diffSitemaps(current, new Sitemap());
    expect(diff.added).toEqual([
      'https://example.com/a',
      'https://example.com/m',
      'https://example.com/z',
    ]);
  });
});
