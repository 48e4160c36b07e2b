export { FileDocumentSource } from './file-document-source.js';
export { FileDocumentSink } from './file-document-sink.js';
