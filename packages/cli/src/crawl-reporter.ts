import type { LinkCrawlerOptions } from '@lastmod/crawler-link';
import type { Logger } from './logger.js';

/** Crawler callbacks that log skipped pages and a crawl cut short by the page limit. */
export function crawlReporter(log: Logger): Pick<LinkCrawlerOptions, 'onError' | 'onLimit'> {
  return {
    onError: (location, error) => log.warn(`Skipped ${location}: ${error.message}`),
    onLimit: (maxPages) =>
      log.warn(
        `Stopped at the ${maxPages}-page limit; pages beyond it are missing from the sitemap`,
      ),
  };
}
