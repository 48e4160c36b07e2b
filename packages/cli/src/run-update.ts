import { XmlSitemapCodec } from '@lastmod/codec-xml';
import { SitemapService } from '@lastmod/core';
import { LinkCrawler } from '@lastmod/crawler-link';
import { FileDocumentSink, FileDocumentSource } from '@lastmod/source-file';
import { HttpDocumentSource } from '@lastmod/source-http';
import type { UpdateOptions } from './cli.js';
import { crawlReporter } from './crawl-reporter.js';
import { createLogger } from './logger.js';
import { DEFAULT_SETTINGS, loadSettingsFile } from './settings.js';
import type { LastmodSettings } from './settings.js';
import { UpdateOrchestrator } from './update-orchestrator.js';
import type { UpdateResult } from './update-orchestrator.js';

/** Defaults, then the settings file, then command-line flags. */
export async function resolveSettings(options: UpdateOptions): Promise<LastmodSettings> {
  const base = options.config ? await loadSettingsFile(options.config) : DEFAULT_SETTINGS;
  return {
    ...base,
    crawler: {
      ...base.crawler,
      maxPages: options.maxPages ?? base.crawler.maxPages,
      maxConcurrency: options.concurrency ?? base.crawler.maxConcurrency,
      timeoutMs: options.timeout ?? base.crawler.timeoutMs,
    },
    sortByUrl: options.sort ? base.sortByUrl : false,
  };
}

export async function runUpdate(siteUrl: string, options: UpdateOptions): Promise<UpdateResult> {
  const settings = await resolveSettings(options);
  const crawlLog = createLogger('Crawl');

  const crawler = new LinkCrawler({ ...settings.crawler, ...crawlReporter(crawlLog) });
  const codec = new XmlSitemapCodec({ gzip: options.output.endsWith('.gz') });
  const sources = [
    new HttpDocumentSource({
      timeoutMs: settings.crawler.timeoutMs,
      userAgent: settings.crawler.userAgent,
    }),
    new FileDocumentSource(),
  ];
  const service = new SitemapService(crawler, codec, sources, {
    normalizeContent: settings.normalizeContent,
    now: () => new Date(),
  });

  const orchestrator = new UpdateOrchestrator(service, new FileDocumentSink(options.output), {
    crawl: crawlLog,
    import: createLogger('Import'),
    combine: createLogger('Combine'),
    write: createLogger('Write'),
  });
  return orchestrator.run({
    siteUrl,
    oldRef: options.old,
    domain: options.domain,
    sortByUrl: settings.sortByUrl,
  });
}
