export { XmlSitemapCodec } from './xml-sitemap-codec.js';
export type { XmlSitemapCodecOptions } from './xml-sitemap-codec.js';
