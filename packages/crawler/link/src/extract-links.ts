import { load } from 'cheerio';

const FOLLOWED_PROTOCOLS = new Set(['http:', 'https:']);

function resolveBase(baseHref: string | undefined, pageUrl: string): string {
  if (baseHref && URL.canParse(baseHref, pageUrl)) {
    return new URL(baseHref, pageUrl).href;
  }
  return pageUrl;
}

/**
 * Same-origin `<a href>` targets of an HTML page, fragment removed, in
 * document order without duplicates. `rel="nofollow"` anchors are skipped.
 */
export function extractLinks(html: string, pageUrl: string, origin: string): string[] {
  const $ = load(html);
  const base = resolveBase($('base[href]').first().attr('href'), pageUrl);
  const links = new Set<string>();

  $('a[href]').each((_, element) => {
    const anchor = $(element);
    const rel = (anchor.attr('rel') ?? '').toLowerCase().split(/\s+/);
    if (rel.includes('nofollow')) return;

    const href = (anchor.attr('href') ?? '').trim();
    if (!href || !URL.canParse(href, base)) return;

    const url = new URL(href, base);
    if (!FOLLOWED_PROTOCOLS.has(url.protocol) || url.origin !== origin) return;
    url.hash = '';
    links.add(url.href);
  });

  return [...links];
}
