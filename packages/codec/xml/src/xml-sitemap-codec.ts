import type { Sitemap, SitemapCodecPort } from '@lastmod/core';
import { gunzipDocument, gzipDocument, isGzip } from './gzip.js';
import { SitemapXmlReader } from './sitemap-xml-reader.js';
import { renderSitemapXml } from './sitemap-xml-writer.js';

export interface XmlSitemapCodecOptions {
  /** Compress encoded documents (`sitemap.xml.gz`). Decoding detects gzip on its own. */
  readonly gzip: boolean;
}

export class XmlSitemapCodec implements SitemapCodecPort {
  readonly id = 'sitemap-xml';
  readonly mediaType: string;
  private readonly reader = new SitemapXmlReader();

  constructor(private readonly options: XmlSitemapCodecOptions = { gzip: false }) {
    this.mediaType = options.gzip ? 'application/gzip' : 'application/xml';
  }

  encode(sitemap: Sitemap): Uint8Array {
    const xml = new TextEncoder().encode(renderSitemapXml(sitemap));
    return this.options.gzip ? gzipDocument(xml) : xml;
  }

  decode(data: Uint8Array): Sitemap {
    const bytes = isGzip(data) ? gunzipDocument(data) : data;
    return this.reader.read(new TextDecoder().decode(bytes));
  }
}
