export interface PageEntry {
  /** Absolute http(s) URL; the entry's identity within a sitemap. */
  readonly location: string;
  /** Content fingerprint, or null when the source document did not carry one. */
  readonly fingerprint: string | null;
  readonly lastModified: Date;
}
