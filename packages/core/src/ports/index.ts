export type { CrawledPage, CrawlerPort } from './crawler.js';
export type { DocumentSinkPort, DocumentSourcePort } from './document.js';
export type { SitemapCodecPort } from './sitemap-codec.js';
