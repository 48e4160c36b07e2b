import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { FetchError } from '@lastmod/core';
import type { DocumentSourcePort } from '@lastmod/core';

const URL_SCHEME = /^[a-z][a-z0-9+.-]+:\/\//i;
const FILE_URL = /^file:\/\//i;

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/** Reads documents from local paths and `file://` URLs. */
export class FileDocumentSource implements DocumentSourcePort {
  supports(ref: string): boolean {
    const trimmed = ref.trim();
    return FILE_URL.test(trimmed) || !URL_SCHEME.test(trimmed);
  }

  async read(ref: string): Promise<Uint8Array> {
    const trimmed = ref.trim();
    const filePath = FILE_URL.test(trimmed) ? fileURLToPath(trimmed) : trimmed;

    try {
      return new Uint8Array(await fs.readFile(filePath));
    } catch (error) {
      const code = errorCode(error);
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(trimmed, reason, { notFound: code === 'ENOENT', cause: error });
    }
  }
}
