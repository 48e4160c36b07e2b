export interface DocumentSourcePort {
  /** Whether this source can resolve the given URL or path. */
  supports(ref: string): boolean;
  read(ref: string): Promise<Uint8Array>;
}

export interface DocumentSinkPort {
  write(data: Uint8Array): Promise<void>;
}
