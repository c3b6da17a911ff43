/** Metadata about the data source, reported when a pipeline starts. */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly mimeType?: string;
}

/**
 * Port for reading delimited text from any origin (file, buffer, stream).
 *
 * `read()` yields chunks whose boundaries carry no meaning: a record may
 * span several chunks and a chunk may hold many records. Splitting into
 * records is the job of `RecordSource`.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for lazy/streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
  /** Return metadata about the source (file name, size, MIME type). */
  metadata(): SourceMetadata;
}
