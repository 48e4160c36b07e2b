export interface CrawledPage {
  readonly location: string;
  readonly content: Uint8Array;
}

export interface CrawlerPort {
  /**
   * Visits every in-scope page reachable from the seed, in no particular
   * order. Rejects when the seed itself cannot be fetched; other pages that
   * fail are left out.
   */
  crawl(seedUrl: string): AsyncIterable<CrawledPage>;
}
