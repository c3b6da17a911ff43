import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/**
 * Data source that streams a local file with `createReadStream`. Node.js only.
 *
 * Chunks are raw Buffers: decoding happens per record, so a multi-byte
 * character split across two chunks stays intact.
 */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<Buffer> {
    const stream = createReadStream(this.filePath, { highWaterMark: this.highWaterMark });

    for await (const chunk of stream) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    }
  }

  /** A missing file has no size here; reading it fails the read stage instead. */
  metadata(): SourceMetadata {
    return {
      fileName: basename(this.filePath),
      fileSize: statSync(this.filePath, { throwIfNoEntry: false })?.size,
      mimeType: detectMimeType(this.filePath),
    };
  }
}
