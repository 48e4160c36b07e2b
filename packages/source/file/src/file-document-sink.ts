import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { DocumentWriteError } from '@lastmod/core';
import type { DocumentSinkPort } from '@lastmod/core';

export class FileDocumentSink implements DocumentSinkPort {
  constructor(private readonly filePath: string) {}

  async write(data: Uint8Array): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, data);
    } catch (error) {
      throw new DocumentWriteError(this.filePath, error);
    }
  }
}
