import { InvalidUrlError } from './exceptions.js';

const WEB_PROTOCOLS = new Set(['http:', 'https:']);

export function parseWebUrl(value: string): URL {
  let url: URL;
  try {
    url = new URL(value.trim());
  } catch (error) {
    throw new InvalidUrlError(value, error);
  }
  if (!WEB_PROTOCOLS.has(url.protocol)) {
    throw new InvalidUrlError(value);
  }
  return url;
}

/** Map key form of a page URL: WHATWG-serialized, without fragment. */
export function normalizeLocation(value: string): string {
  const url = parseWebUrl(value);
  url.hash = '';
  return url.href;
}
