import { MalformedDocumentError } from '@lastmod/core';
import pako from 'pako';

export function isGzip(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

export function gzipDocument(data: Uint8Array): Uint8Array {
  return pako.gzip(data);
}

export function gunzipDocument(data: Uint8Array): Uint8Array {
  try {
    return pako.ungzip(data);
  } catch (error) {
    throw new MalformedDocumentError(`Corrupt gzip stream: ${String(error)}`, error);
  }
}
