export const SITEMAP_NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';
export const XHTML_NAMESPACE = 'http://www.w3.org/1999/xhtml';

/** `name` of the `<xhtml:meta>` element that carries a page fingerprint. */
export const FINGERPRINT_META_NAME = 'auto_sitemap_md5_hash';
