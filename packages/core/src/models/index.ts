export type { PageEntry } from './page-entry.js';
export { Sitemap } from './sitemap.js';
