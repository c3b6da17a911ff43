import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

/** Data source over an in-memory string or Buffer. Yields the content as a single chunk. */
export class BufferSource implements DataSource {
  private readonly content: Buffer;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata?: Partial<SourceMetadata>) {
    this.content = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: this.content.length,
      mimeType: metadata?.mimeType ?? (metadata?.fileName ? detectMimeType(metadata.fileName) : 'text/plain'),
    };
  }

  async *read(): AsyncIterable<Buffer> {
    yield await Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
