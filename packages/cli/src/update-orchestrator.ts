import { FetchError, parseWebUrl, Sitemap } from '@lastmod/core';
import type { DocumentSinkPort, SitemapService } from '@lastmod/core';
import type { Logger } from './logger.js';
import { UpdateError } from './update-error.js';

export interface UpdateRequest {
  readonly siteUrl: string;
  /** URL or path of the currently published sitemap. */
  readonly oldRef?: string;
  /** Origin the sitemap is published under, when the crawl runs elsewhere. */
  readonly domain?: string;
  readonly sortByUrl: boolean;
}

export interface UpdateResult {
  readonly pages: number;
  readonly added: number;
  readonly changed: number;
  readonly unchanged: number;
  readonly removed: number;
}

export interface UpdateLoggers {
  readonly crawl: Logger;
  readonly import: Logger;
  readonly combine: Logger;
  readonly write: Logger;
}

export class UpdateOrchestrator {
  constructor(
    private readonly service: SitemapService,
    private readonly sink: DocumentSinkPort,
    private readonly log: UpdateLoggers,
  ) {}

  async run(request: UpdateRequest): Promise<UpdateResult> {
    const domain = request.domain === undefined ? undefined : parseWebUrl(request.domain).origin;

    this.log.crawl.info(`Crawling ${request.siteUrl}`);
    let fresh: Sitemap;
    try {
      fresh = await this.service.generateByCrawling(request.siteUrl);
    } catch (error) {
      throw new UpdateError('crawl', error);
    }
    this.log.crawl.info(`Crawled ${fresh.size} pages`);

    if (domain !== undefined) {
      fresh = fresh.withDomain(domain);
    }

    const old = await this.importPublished(request.oldRef);

    const { sitemap, diff } = this.service.combine(fresh, old);
    this.log.combine.info(
      `${diff.added.length} new, ${diff.changed.length} changed, ` +
        `${diff.unchanged.length} unchanged, ${diff.removed.length} removed`,
    );
    if (request.sortByUrl) {
      sitemap.sortByUrl();
    }

    try {
      await this.service.serialize(sitemap, this.sink);
    } catch (error) {
      throw new UpdateError('write', error);
    }
    this.log.write.info(`Wrote ${sitemap.size} entries`);

    return {
      pages: sitemap.size,
      added: diff.added.length,
      changed: diff.changed.length,
      unchanged: diff.unchanged.length,
      removed: diff.removed.length,
    };
  }

  private async importPublished(ref: string | undefined): Promise<Sitemap> {
    if (ref === undefined) {
      this.log.import.info('No published sitemap given; all pages take the crawl time');
      return new Sitemap();
    }

    try {
      const old = await this.service.importSitemap(ref);
      this.log.import.info(`Imported ${old.size} entries from ${ref}`);
      return old;
    } catch (error) {
      if (error instanceof FetchError && error.notFound) {
        this.log.import.warn(`No sitemap published at ${ref} yet; starting from an empty one`);
        return new Sitemap();
      }
      throw new UpdateError('import', error);
    }
  }
}
