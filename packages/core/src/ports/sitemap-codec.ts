import type { Sitemap } from '../models/sitemap.js';

export interface SitemapCodecPort {
  readonly id: string;
  readonly mediaType: string;
  encode(sitemap: Sitemap): Uint8Array;
  decode(data: Uint8Array): Sitemap;
}
