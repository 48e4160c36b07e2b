import { combineSitemaps } from './combine.js';
import { FetchError } from './exceptions.js';
import { fingerprint, normalizePageContent } from './hash.js';
import { Sitemap } from './models/sitemap.js';
import type { CrawlerPort } from './ports/crawler.js';
import type { DocumentSinkPort, DocumentSourcePort } from './ports/document.js';
import type { SitemapCodecPort } from './ports/sitemap-codec.js';
import { diffSitemaps } from './sitemap-diff.js';
import type { SitemapDiff } from './sitemap-diff.js';
import { truncateToSeconds } from './timestamp.js';
import { normalizeLocation } from './url.js';

export interface SitemapServiceOptions {
  readonly normalizeContent: boolean;
  readonly now: () => Date;
}

export const DEFAULT_SERVICE_OPTIONS: SitemapServiceOptions = {
  normalizeContent: true,
  now: () => new Date(),
};

export interface CombineResult {
  readonly sitemap: Sitemap;
  readonly diff: SitemapDiff;
}

export class SitemapService {
  constructor(
    private readonly crawler: CrawlerPort,
    private readonly codec: SitemapCodecPort,
    private readonly sources: readonly DocumentSourcePort[],
    private readonly options: SitemapServiceOptions = DEFAULT_SERVICE_OPTIONS,
  ) {}

  /**
   * Crawls the site and fingerprints every page. All entries share one
   * provisional timestamp, taken when the crawl starts.
   */
  async generateByCrawling(seedUrl: string): Promise<Sitemap> {
    const seed = normalizeLocation(seedUrl);
    const provisional = truncateToSeconds(this.options.now());
    const sitemap = new Sitemap();

    for await (const page of this.crawler.crawl(seed)) {
      const location = normalizeLocation(page.location);
      if (sitemap.has(location)) continue;

      const content = this.options.normalizeContent
        ? normalizePageContent(page.content)
        : page.content;
      sitemap.set({ location, fingerprint: fingerprint(content), lastModified: provisional });
    }

    return sitemap;
  }

  async importSitemap(document: string | Uint8Array): Promise<Sitemap> {
    const data = typeof document === 'string' ? await this.readDocument(document) : document;
    return this.codec.decode(data);
  }

  combine(current: Sitemap, saved: Sitemap): CombineResult {
    return {
      sitemap: combineSitemaps(current, saved),
      diff: diffSitemaps(current, saved),
    };
  }

  async serialize(sitemap: Sitemap, sink: DocumentSinkPort): Promise<void> {
    await sink.write(this.codec.encode(sitemap));
  }

  private async readDocument(ref: string): Promise<Uint8Array> {
    const source = this.sources.find((candidate) => candidate.supports(ref));
    if (!source) {
      throw new FetchError(ref, 'no document source accepts this reference');
    }
    return source.read(ref);
  }
}
