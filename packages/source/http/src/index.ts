export { HttpDocumentSource, DEFAULT_HTTP_SOURCE_OPTIONS } from './http-document-source.js';
export type { HttpDocumentSourceOptions } from './http-document-source.js';
