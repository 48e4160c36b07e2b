import { FetchError } from '@lastmod/core';
import type { CrawledPage } from '@lastmod/core';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { LinkCrawler } from '../src/link-crawler.js';
import { html, serveNothing, serveSite } from './site-fixture.js';

async function collect(pages: AsyncIterable<CrawledPage>): Promise<CrawledPage[]> {
  const result: CrawledPage[] = [];
  for await (const page of pages) {
    result.push(page);
  }
  return result;
}

const SITE = {
  'https://example.com/': { body: html('/a', '/b') },
  'https://example.com/a': { body: html('/b', 'c') },
  'https://example.com/b': { body: html() },
  'https://example.com/c': { body: html('/c', '/gone') },
  'https://example.com/gone': { status: 404, body: 'not found' },
  'https://example.com/d': { body: html() },
};

describe('LinkCrawler', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('visits every page reachable from the seed in breadth-first order', async () => {
    serveSite(SITE);
    const onError = vi.fn();
    const crawler = new LinkCrawler({ onError });

    const pages = await collect(crawler.crawl('https://example.com'));

    expect(pages.map((page) => page.location)).toEqual([
      'https://example.com/',
      'https://example.com/a',
      'https://example.com/b',
      'https://example.com/c',
    ]);
    expect(new TextDecoder().decode(pages[2]?.content)).toBe(SITE['https://example.com/b'].body);
  });

  it('reports pages that fail and leaves them out', async () => {
    serveSite(SITE);
    const onError = vi.fn();

    await collect(new LinkCrawler({ onError }).crawl('https://example.com/'));

    expect(onError).toHaveBeenCalledTimes(1);
    const [location, error] = onError.mock.calls[0] ?? [];
    expect(location).toBe('https://example.com/gone');
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 404, notFound: true });
  });

  it('fetches each page once', async () => {
    const fetchMock = serveSite(SITE);

    await collect(new LinkCrawler().crawl('https://example.com/'));

    expect(fetchMock).toHaveBeenCalledTimes(5);
  });

  it('sends the configured user agent', async () => {
    const fetchMock = serveSite({ 'https://example.com/': { body: html() } });

    await collect(new LinkCrawler({ userAgent: 'test-agent/1.0' }).crawl('https://example.com/'));

    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.com/',
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'test-agent/1.0' }),
      }),
    );
  });

  it('stops after maxPages pages', async () => {
    const fetchMock = serveSite(SITE);

    const pages = await collect(new LinkCrawler({ maxPages: 2 }).crawl('https://example.com/'));

    expect(pages.map((page) => page.location)).toEqual([
      'https://example.com/',
      'https://example.com/a',
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('reports when maxPages cuts the crawl short', async () => {
    serveSite(SITE);
    const onLimit = vi.fn();

    await collect(new LinkCrawler({ maxPages: 2, onLimit }).crawl('https://example.com/'));

    expect(onLimit).toHaveBeenCalledTimes(1);
    expect(onLimit).toHaveBeenCalledWith(2);
  });

  it('does not report the limit when every link was visited', async () => {
    serveSite(SITE);
    const onLimit = vi.fn();

    await collect(new LinkCrawler({ onLimit }).crawl('https://example.com/'));

    expect(onLimit).not.toHaveBeenCalled();
  });

  it('follows a seed that redirects to another origin', async () => {
    serveSite({
      'http://example.com/': { redirectTo: 'https://example.com/', body: html('/about') },
      'https://example.com/about': { body: html('http://example.com/legacy') },
    });

    const pages = await collect(new LinkCrawler().crawl('http://example.com/'));

    expect(pages.map((page) => page.location)).toEqual([
      'https://example.com/',
      'https://example.com/about',
    ]);
  });

  it('throws a FetchError when the seed is not an HTML page', async () => {
    serveSite({
      'https://example.com/': { contentType: 'application/pdf', body: '%PDF-1.4' },
    });

    await expect(collect(new LinkCrawler().crawl('https://example.com/'))).rejects.toMatchObject({
      name: 'FetchError',
      message: 'Failed to fetch https://example.com/: not an HTML page (application/pdf)',
    });
  });

  it('lists a redirected page once, under its final URL', async () => {
    const fetchMock = serveSite({
      'https://example.com/': { body: html('/old') },
      'https://example.com/old': {
        redirectTo: 'https://example.com/new',
        body: html('/new', '/old'),
      },
    });

    const pages = await collect(new LinkCrawler().crawl('https://example.com/'));

    expect(pages.map((page) => page.location)).toEqual([
      'https://example.com/',
      'https://example.com/new',
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not yield a page fetched twice through a redirect', async () => {
    serveSite({
      'https://example.com/': { body: html('/old', '/new') },
      'https://example.com/old': { redirectTo: 'https://example.com/new', body: html() },
      'https://example.com/new': { body: html() },
    });

    const pages = await collect(new LinkCrawler().crawl('https://example.com/'));

    expect(pages.map((page) => page.location)).toEqual([
      'https://example.com/',
      'https://example.com/new',
    ]);
  });

  it('skips pages that redirect off the site', async () => {
    serveSite({
      'https://example.com/': { body: html('/out') },
      'https://example.com/out': { redirectTo: 'https://other.test/', body: html() },
    });
    const onError = vi.fn();

    const pages = await collect(new LinkCrawler({ onError }).crawl('https://example.com/'));

    expect(pages.map((page) => page.location)).toEqual(['https://example.com/']);
    expect(onError).not.toHaveBeenCalled();
  });

  it('gives up on a seed that does not answer within timeoutMs', async () => {
    const { aborts } = serveNothing();

    const error: unknown = await collect(
      new LinkCrawler({ timeoutMs: 20 }).crawl('https://example.com/'),
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      message: 'Failed to fetch https://example.com/: no response within 20 ms',
    });
    expect(aborts).toHaveLength(1);
    expect(error instanceof FetchError && error.cause).toBe(aborts[0]);
  });

  it('fetches at most maxConcurrency pages per wave', async () => {
    const fetchMock = serveSite(SITE);

    const pages = await collect(
      new LinkCrawler({ maxConcurrency: 1 }).crawl('https://example.com/'),
    );

    expect(pages).toHaveLength(4);
    expect(fetchMock.mock.calls.map(([input]) => input)).toEqual([
      'https://example.com/',
      'https://example.com/a',
      'https://example.com/b',
      'https://example.com/c',
      'https://example.com/gone',
    ]);
  });

  it('does not yield or mine non-HTML responses', async () => {
    serveSite({
      'https://example.com/': { body: html('/report.pdf', '/feed') },
      'https://example.com/report.pdf': { contentType: 'application/pdf', body: '%PDF-1.4' },
      'https://example.com/feed': { contentType: 'application/rss+xml', body: '<rss/>' },
    });
    const onError = vi.fn();

    const pages = await collect(new LinkCrawler({ onError }).crawl('https://example.com/'));

    expect(pages.map((page) => page.location)).toEqual(['https://example.com/']);
    expect(onError).not.toHaveBeenCalled();
  });

  it('throws a FetchError when the seed cannot be fetched', async () => {
    serveSite({});

    await expect(collect(new LinkCrawler().crawl('https://example.com/'))).rejects.toThrow(
      FetchError,
    );
  });

  it('throws a FetchError carrying the status when the seed answers with an error', async () => {
    serveSite({ 'https://example.com/': { status: 503, body: 'down' } });

    await expect(collect(new LinkCrawler().crawl('https://example.com/'))).rejects.toMatchObject({
      name: 'FetchError',
      status: 503,
      message: 'Failed to fetch https://example.com/: HTTP 503',
    });
  });
});
