import { FetchError, normalizeLocation } from '@lastmod/core';
import type { CrawledPage, CrawlerPort } from '@lastmod/core';
import { extractLinks } from './extract-links.js';
import { fetchPage } from './fetch-page.js';

export interface LinkCrawlerOptions {
  /** Upper bound on pages yielded per crawl. */
  readonly maxPages: number;
  /** Requests in flight at once. */
  readonly maxConcurrency: number;
  readonly timeoutMs: number;
  readonly userAgent: string;
  /** Called for every page other than the seed that could not be fetched. */
  readonly onError?: (location: string, error: FetchError) => void;
  /** Called once when the crawl stops at `maxPages` with links still unvisited. */
  readonly onLimit?: (maxPages: number) => void;
}

export const DEFAULT_LINK_CRAWLER_OPTIONS: LinkCrawlerOptions = {
  maxPages: 500,
  maxConcurrency: 4,
  timeoutMs: 10_000,
  userAgent: 'lastmod/0.1 (+sitemap generator)',
};

const HTML_CONTENT_TYPE = /^\s*(text\/html|application\/xhtml\+xml)\b/i;

type Visit =
  | {
      readonly kind: 'page';
      readonly location: string;
      readonly content: Uint8Array;
      readonly links: string[];
    }
  | { readonly kind: 'skipped'; readonly location: string; readonly reason: string }
  | { readonly kind: 'failed'; readonly location: string; readonly error: FetchError };

function toFetchError(location: string, error: unknown): FetchError {
  if (error instanceof FetchError) return error;
  return new FetchError(location, error instanceof Error ? error.message : String(error), {
    cause: error,
  });
}

function takeWave(queue: string[], size: number, emitted: ReadonlySet<string>): string[] {
  const wave: string[] = [];
  while (wave.length < size && queue.length > 0) {
    const next = queue.shift();
    if (next !== undefined && !emitted.has(next)) wave.push(next);
  }
  return wave;
}

/**
 * Breadth-first crawl of a site, following `<a href>` links.
 *
 * The seed is fetched first and the origin it ends up on (after redirects)
 * becomes the crawl scope. Pages are then fetched in waves of at most
 * `maxConcurrency` requests. Only successful HTML responses are yielded,
 * under their final URL; a redirect off the origin is skipped. The seed
 * failing, or not being an HTML page, ends the crawl with a {@link FetchError}.
 */
export class LinkCrawler implements CrawlerPort {
  private readonly options: LinkCrawlerOptions;

  constructor(options: Partial<LinkCrawlerOptions> = {}) {
    this.options = { ...DEFAULT_LINK_CRAWLER_OPTIONS, ...options };
  }

  async *crawl(seedUrl: string): AsyncIterable<CrawledPage> {
    const requested = normalizeLocation(seedUrl);
    const { maxPages, onError, onLimit } = this.options;
    const maxConcurrency = Math.max(1, this.options.maxConcurrency);

    const seed = await this.visit(requested);
    if (seed.kind === 'failed') throw seed.error;
    if (seed.kind === 'skipped') throw new FetchError(requested, seed.reason);
    const origin = new URL(seed.location).origin;

    const seen = new Set<string>([requested]);
    const emitted = new Set<string>();
    const queue: string[] = [];
    let visits: Visit[] = [seed];

    while (visits.length > 0) {
      for (const visit of visits) {
        if (visit.kind === 'failed') {
          onError?.(visit.location, visit.error);
          continue;
        }
        if (visit.kind === 'skipped' || emitted.has(visit.location)) continue;

        emitted.add(visit.location);
        seen.add(visit.location);
        yield { location: visit.location, content: visit.content };

        for (const link of visit.links) {
          if (seen.has(link)) continue;
          seen.add(link);
          queue.push(link);
        }
      }

      if (emitted.size >= maxPages) {
        if (queue.some((location) => !emitted.has(location))) onLimit?.(maxPages);
        return;
      }
      const wave = takeWave(queue, Math.min(maxConcurrency, maxPages - emitted.size), emitted);
      visits = await Promise.all(wave.map((location) => this.visit(location, origin)));
    }
  }

  /** Without `origin`, any final origin is accepted. */
  private async visit(location: string, origin?: string): Promise<Visit> {
    try {
      const page = await fetchPage(location, this.options);
      if (!page.ok) {
        const error = new FetchError(location, `HTTP ${page.status}`, {
          status: page.status,
          notFound: page.status === 404 || page.status === 410,
        });
        return { kind: 'failed', location, error };
      }

      const finalLocation = normalizeLocation(page.url);
      const finalOrigin = new URL(finalLocation).origin;
      if (origin !== undefined && finalOrigin !== origin) {
        return { kind: 'skipped', location, reason: `redirected off the site to ${finalLocation}` };
      }
      if (!HTML_CONTENT_TYPE.test(page.contentType)) {
        const contentType = page.contentType || 'no content type';
        return { kind: 'skipped', location, reason: `not an HTML page (${contentType})` };
      }

      const html = new TextDecoder().decode(page.body);
      return {
        kind: 'page',
        location: finalLocation,
        content: page.body,
        links: extractLinks(html, page.url, origin ?? finalOrigin),
      };
    } catch (error) {
      return { kind: 'failed', location, error: toFetchError(location, error) };
    }
  }
}
