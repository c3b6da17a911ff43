import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** File name for metadata. Default: 'stream-input'. */
  readonly fileName?: string;
  /** MIME type for metadata. Default: 'text/plain'. */
  readonly mimeType?: string;
  /** File size in bytes for metadata (if known). */
  readonly fileSize?: number;
}

type Chunk = string | Buffer | Uint8Array;

/**
 * Data source that wraps an `AsyncIterable` (e.g. `process.stdin`, a Node
 * readable) or a web `ReadableStream`. Can be read once.
 *
 * Chunks are passed through undecoded; `Uint8Array` chunks become Buffers.
 */
export class StreamSource implements DataSource {
  private readonly stream: AsyncIterable<Chunk> | ReadableStream<Chunk>;
  private readonly meta: SourceMetadata;
  private consumed = false;

  constructor(stream: AsyncIterable<Chunk> | ReadableStream<Chunk>, options?: StreamSourceOptions) {
    this.stream = stream;
    this.meta = {
      fileName: options?.fileName ?? 'stream-input',
      fileSize: options?.fileSize,
      mimeType: options?.mimeType ?? 'text/plain',
    };
  }

  async *read(): AsyncIterable<string | Buffer> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = this.isReadableStream(this.stream) ? this.fromReadableStream(this.stream) : this.stream;

    for await (const chunk of iterable) {
      yield typeof chunk === 'string' || Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    }
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private isReadableStream(stream: AsyncIterable<Chunk> | ReadableStream<Chunk>): stream is ReadableStream<Chunk> {
    return 'getReader' in stream && typeof stream.getReader === 'function';
  }

  private async *fromReadableStream(stream: ReadableStream<Chunk>): AsyncIterable<Chunk> {
    const reader = stream.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield value;
      }
    } finally {
      reader.releaseLock();
    }
  }
}
