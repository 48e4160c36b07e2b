export { LinkCrawler, DEFAULT_LINK_CRAWLER_OPTIONS } from './link-crawler.js';
export type { LinkCrawlerOptions } from './link-crawler.js';
