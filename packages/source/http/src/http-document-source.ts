import { FetchError } from '@lastmod/core';
import type { DocumentSourcePort } from '@lastmod/core';

export interface HttpDocumentSourceOptions {
  readonly timeoutMs: number;
  readonly userAgent: string;
}

export const DEFAULT_HTTP_SOURCE_OPTIONS: HttpDocumentSourceOptions = {
  timeoutMs: 10_000,
  userAgent: 'lastmod/0.1 (+sitemap generator)',
};

const HTTP_REF = /^https?:\/\//i;

/** Statuses meaning the document was never published, as opposed to a failing server. */
const NOT_FOUND_STATUSES = new Set([404, 410]);

export class HttpDocumentSource implements DocumentSourcePort {
  private readonly options: HttpDocumentSourceOptions;

  constructor(options: Partial<HttpDocumentSourceOptions> = {}) {
    this.options = { ...DEFAULT_HTTP_SOURCE_OPTIONS, ...options };
  }

  supports(ref: string): boolean {
    return HTTP_REF.test(ref.trim());
  }

  async read(ref: string): Promise<Uint8Array> {
    const url = ref.trim();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    let body: ArrayBuffer;
    try {
      response = await fetch(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'application/xml, text/xml, application/gzip, */*',
        },
      });
      body = await response.arrayBuffer();
    } catch (error) {
      const reason = controller.signal.aborted
        ? `no response within ${this.options.timeoutMs} ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new FetchError(url, reason, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new FetchError(url, `HTTP ${response.status}`, {
        status: response.status,
        notFound: NOT_FOUND_STATUSES.has(response.status),
      });
    }
    return new Uint8Array(body);
  }
}
