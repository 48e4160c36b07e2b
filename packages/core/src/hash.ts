import { createHash } from 'node:crypto';

export const FINGERPRINT_PATTERN = /^[0-9a-f]{32}$/;

export function fingerprint(content: Uint8Array): string {
  return createHash('md5').update(content).digest('hex');
}

/**
 * Trims surrounding whitespace and folds CRLF line endings, so servers that
 * vary only in line endings do not register as content changes.
 */
export function normalizePageContent(content: Uint8Array): Uint8Array {
  const text = new TextDecoder().decode(content);
  return new TextEncoder().encode(text.trim().replace(/\r\n/g, '\n'));
}
