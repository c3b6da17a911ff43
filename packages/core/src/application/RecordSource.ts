import type { DataSource, SourceMetadata } from '../domain/ports/DataSource.js';
import type { SizeTracker } from '../domain/ports/SizeTracker.js';
import type { SourceRecord } from '../domain/model/Record.js';
import { SourceReadError } from '../domain/errors/PipelineErrors.js';

export interface RecordSourceOptions {
  /** Single-byte record terminator. Default: `'\n'`. */
  readonly delimiter?: string;
  /** Encoding used to turn record bytes into text. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Observer that receives the number of bytes consumed per record. */
  readonly sizeTracker?: SizeTracker;
}

const EMPTY = Buffer.alloc(0);

/**
 * Splits a `DataSource` into delimiter-terminated records.
 *
 * Single consumer. Holds at most one partial record plus the rest of the
 * current chunk. Trailing bytes after the last delimiter form a final record;
 * input that ends on a delimiter yields no empty trailing record.
 */
export class RecordSource implements AsyncIterable<SourceRecord> {
  private readonly delimiterByte: number;
  private readonly encoding: BufferEncoding;
  private readonly sizeTracker: SizeTracker | null;
  private chunks: AsyncIterator<string | Buffer> | null = null;
  private pending: Buffer = EMPTY;
  private scanned = 0;
  private ended = false;
  private failure: SourceReadError | null = null;
  private count = 0;
  private bytes = 0;

  constructor(
    private readonly source: DataSource,
    options?: RecordSourceOptions,
  ) {
    const delimiter = options?.delimiter ?? '\n';
    if (delimiter.length !== 1 || delimiter.charCodeAt(0) > 0x7f) {
      throw new Error(`Record delimiter must be a single ASCII character, got ${JSON.stringify(delimiter)}`);
    }
    this.delimiterByte = delimiter.charCodeAt(0);
    this.encoding = options?.encoding ?? 'utf-8';
    this.sizeTracker = options?.sizeTracker ?? null;
  }

  /** Number of records produced so far. */
  get processed(): number {
    return this.count;
  }

  /** Bytes consumed so far, delimiters included. */
  get bytesRead(): number {
    return this.bytes;
  }

  /**
   * Read the next record and assign it the next sequence index.
   *
   * @returns The record, or `null` at a clean end of input.
   * @throws SourceReadError if the underlying stream fails.
   */
  async next(): Promise<SourceRecord | null> {
    const text = await this.readText();
    if (text === null) return null;

    const record: SourceRecord = { index: this.count, text };
    this.count++;
    return record;
  }

  /**
   * Read one line without assigning a sequence index. Used for header rows.
   * Consumed bytes are still reported.
   */
  readLine(): Promise<string | null> {
    return this.readText();
  }

  /** Metadata of the underlying data source. */
  metadata(): SourceMetadata {
    return this.source.metadata();
  }

  /**
   * Stop reading and release the underlying stream (file handle, socket).
   * Later reads report a clean end of input. Idempotent.
   */
  async close(): Promise<void> {
    this.ended = true;
    this.pending = EMPTY;
    this.scanned = 0;

    const chunks = this.chunks;
    this.chunks = null;
    await chunks?.return?.();
  }

  /** Iterate the remaining records. Leaving the loop early closes the source. */
  async *[Symbol.asyncIterator](): AsyncIterator<SourceRecord> {
    try {
      for (;;) {
        const record = await this.next();
        if (record === null) return;
        yield record;
      }
    } finally {
      await this.close();
    }
  }

  private async readText(): Promise<string | null> {
    if (this.failure) throw this.failure;

    for (;;) {
      const end = this.pending.indexOf(this.delimiterByte, this.scanned);
      if (end !== -1) {
        return this.take(end, end + 1);
      }
      this.scanned = this.pending.length;

      if (this.ended) {
        return this.pending.length > 0 ? this.take(this.pending.length, this.pending.length) : null;
      }

      await this.fill();
    }
  }

  private take(end: number, consumed: number): string {
    const text = this.pending.toString(this.encoding, 0, end);
    this.pending = this.pending.subarray(consumed);
    this.scanned = 0;
    this.bytes += consumed;
    this.sizeTracker?.add(consumed);
    return text;
  }

  private async fill(): Promise<void> {
    this.chunks ??= this.source.read()[Symbol.asyncIterator]();

    let result: IteratorResult<string | Buffer>;
    try {
      result = await this.chunks.next();
    } catch (error) {
      this.failure = new SourceReadError(this.count + 1, error);
      throw this.failure;
    }

    if (result.done) {
      this.ended = true;
      return;
    }

    const chunk = typeof result.value === 'string' ? Buffer.from(result.value, this.encoding) : result.value;
    this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
  }
}
