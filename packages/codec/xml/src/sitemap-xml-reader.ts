import {
  FINGERPRINT_PATTERN,
  InvalidUrlError,
  MalformedDocumentError,
  normalizeLocation,
  parseLastModified,
  Sitemap,
} from '@lastmod/core';
import type { PageEntry } from '@lastmod/core';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { FINGERPRINT_META_NAME } from './constants.js';

const ARRAY_PATHS = new Set(['urlset.url', 'urlset.url.meta']);

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim();
  if (Array.isArray(value)) return textOf(value[0]);
  if (isNode(value)) return textOf(value['#text']);
  return undefined;
}

export class SitemapXmlReader {
  private readonly parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (_name: string, jpath: string) => ARRAY_PATHS.has(jpath),
  });

  read(xml: string): Sitemap {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      const { code, msg, line, col } = validation.err;
      throw new MalformedDocumentError(`Invalid XML (${code}) at ${line}:${col}: ${msg}`);
    }

    const document: unknown = this.parser.parse(xml);
    const root: XmlNode = isNode(document) ? document : {};
    if (!('urlset' in root)) {
      if ('sitemapindex' in root) {
        throw new MalformedDocumentError(
          'Sitemap index documents are not supported; import one of the sitemaps it lists',
        );
      }
      throw new MalformedDocumentError('Missing <urlset> root element');
    }

    const urlset = root.urlset;
    const nodes: unknown[] = isNode(urlset) && Array.isArray(urlset.url) ? urlset.url : [];
    return Sitemap.from(nodes.map((node, index) => this.toPageEntry(node, index + 1)));
  }

  private toPageEntry(node: unknown, position: number): PageEntry {
    if (!isNode(node)) {
      throw new MalformedDocumentError(`<url> #${position} is empty`);
    }

    const loc = textOf(node.loc);
    if (!loc) {
      throw new MalformedDocumentError(`<url> #${position} is missing <loc>`);
    }
    const lastmod = textOf(node.lastmod);
    if (!lastmod) {
      throw new MalformedDocumentError(`<url> #${position} (${loc}) is missing <lastmod>`);
    }

    let location: string;
    try {
      location = normalizeLocation(loc);
    } catch (error) {
      if (!(error instanceof InvalidUrlError)) throw error;
      throw new MalformedDocumentError(`<url> #${position} has an invalid <loc>: ${loc}`, error);
    }

    return {
      location,
      fingerprint: readFingerprint(node.meta),
      lastModified: parseLastModified(lastmod),
    };
  }
}

function readFingerprint(meta: unknown): string | null {
  const candidates: unknown[] = Array.isArray(meta) ? meta : [];
  for (const candidate of candidates) {
    if (!isNode(candidate)) continue;
    const name = candidate['@_name'];
    const content = candidate['@_content'];
    if (typeof name !== 'string' || typeof content !== 'string') continue;
    const value = content.trim();
    // Hand-edited documents may carry uppercase hex; the value is kept as written.
    if (name.trim() === FINGERPRINT_META_NAME && FINGERPRINT_PATTERN.test(value.toLowerCase())) {
      return value;
    }
  }
  return null;
}
