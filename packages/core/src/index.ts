export * from './models/index.js';

export type {
  CrawledPage,
  CrawlerPort,
  DocumentSinkPort,
  DocumentSourcePort,
  SitemapCodecPort,
} from './ports/index.js';

export {
  DocumentWriteError,
  FetchError,
  InvalidUrlError,
  MalformedDocumentError,
  TimestampFormatError,
} from './exceptions.js';
export type { FetchErrorOptions } from './exceptions.js';

export { FINGERPRINT_PATTERN, fingerprint, normalizePageContent } from './hash.js';
export { formatLastModified, parseLastModified, truncateToSeconds } from './timestamp.js';
export { normalizeLocation, parseWebUrl } from './url.js';

export { diffSitemaps, hasSameContent } from './sitemap-diff.js';
export type { SitemapDiff } from './sitemap-diff.js';
export { combineSitemaps } from './combine.js';

export { DEFAULT_SERVICE_OPTIONS, SitemapService } from './sitemap-service.js';
export type { CombineResult, SitemapServiceOptions } from './sitemap-service.js';
