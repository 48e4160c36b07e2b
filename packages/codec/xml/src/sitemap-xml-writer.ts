import { formatLastModified } from '@lastmod/core';
import type { Sitemap } from '@lastmod/core';
import { FINGERPRINT_META_NAME, SITEMAP_NAMESPACE, XHTML_NAMESPACE } from './constants.js';

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

export function renderSitemapXml(sitemap: Sitemap): string {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<urlset xmlns="${SITEMAP_NAMESPACE}" xmlns:xhtml="${XHTML_NAMESPACE}">`,
  ];

  for (const entry of sitemap) {
    lines.push('  <url>');
    lines.push(`    <loc>${escapeXml(entry.location)}</loc>`);
    lines.push(`    <lastmod>${formatLastModified(entry.lastModified)}</lastmod>`);
    if (entry.fingerprint !== null) {
      lines.push(
        `    <xhtml:meta name="${FINGERPRINT_META_NAME}" content="${escapeXml(entry.fingerprint)}"/>`,
      );
    }
    lines.push('  </url>');
  }

  lines.push('</urlset>');
  return `${lines.join('\n')}\n`;
}
