import { FetchError } from '@lastmod/core';

export interface FetchPageOptions {
  readonly timeoutMs: number;
  readonly userAgent: string;
}

export interface FetchedPage {
  readonly status: number;
  readonly ok: boolean;
  /** URL after redirects. */
  readonly url: string;
  readonly contentType: string;
  readonly body: Uint8Array;
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** GET with a deadline covering both the response and its body. */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<FetchedPage> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      redirect: 'follow',
      headers: {
        'User-Agent': options.userAgent,
        Accept: 'text/html, application/xhtml+xml;q=0.9, */*;q=0.8',
      },
    });
    const body = new Uint8Array(await response.arrayBuffer());
    return {
      status: response.status,
      ok: response.ok,
      url: response.url || url,
      contentType: response.headers.get('content-type') ?? '',
      body,
    };
  } catch (error) {
    const reason = controller.signal.aborted
      ? `no response within ${options.timeoutMs} ms`
      : reasonOf(error);
    throw new FetchError(url, reason, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}
