import {
  EventBus,
  RecordPipeline,
  RecordSource,
  PipelineStatus,
  type ConversionErrorPolicy,
  type ConversionOutcome,
  type DataSource,
  type DomainEvent,
  type EventPayload,
  type EventType,
  type OutcomeSink,
  type PipelineResult,
  type PipelineStatusResult,
  type SizeTracker,
} from '@recordflow/core';
import type { ImportFormat } from './domain/model/ImportFormat.js';
import type { PreviewResult } from './domain/model/PreviewResult.js';
import type { TokenizingConverter } from './domain/ports/TokenizingConverter.js';
import { createConverter } from './infrastructure/converters/createConverter.js';
import { ResolveFields } from './application/usecases/ResolveFields.js';
import { PreviewImport } from './application/usecases/PreviewImport.js';
import { validateFields } from './domain/services/FieldValidator.js';

/** Configuration for importing one delimited-text input. */
export interface RecordImportConfig {
  /** Text dialect of the input. */
  readonly format: ImportFormat;
  /** Field names to bind tokens to. Exactly one of `fields` and `headerLine` must be set. */
  readonly fields?: readonly string[];
  /** Read field names from the first line of the input. */
  readonly headerLine?: boolean;
  /** Number of concurrent decode workers. Default: `os.availableParallelism()`. */
  readonly numDecoders?: number;
  /** Emit documents in input order. Default: `false`. */
  readonly ordered?: boolean;
  /** Whether a record that fails to convert ends the import. Default: `'continue'`. */
  readonly conversionErrors?: ConversionErrorPolicy;
  /** Turn numeric and boolean tokens into numbers and booleans. Default: `false`. */
  readonly inferTypes?: boolean;
  /** Fail records whose token count differs from the field count. Default: `false`. */
  readonly strictFieldCount?: boolean;
  /** Leave empty tokens out of documents. Default: `false`. */
  readonly ignoreBlanks?: boolean;
  /** CSV token separator. Default: `','`. */
  readonly delimiter?: string;
  /** Input encoding. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Observer for bytes read, e.g. to drive a progress bar. */
  readonly sizeTracker?: SizeTracker;
}

const NOT_STARTED: PipelineStatusResult = {
  status: PipelineStatus.CREATED,
  progress: { recordsRead: 0, bytesRead: 0, emitted: 0, failed: 0, elapsedMs: 0 },
};

/**
 * Facade that imports delimited text into documents: header → decode → merge.
 *
 * Wraps `RecordPipeline` from `@recordflow/core` and adds the format
 * converters, header parsing, field validation and preview.
 *
 * @example
 * ```typescript
 * const importer = new RecordImport({ format: 'tsv', headerLine: true, ordered: true });
 * importer.from(new FilePathSource('./people.tsv'));
 * const result = await importer.start(async (outcome) => { if (outcome.ok) await save(outcome.document); });
 * ```
 */
export class RecordImport {
  private readonly config: RecordImportConfig;
  private readonly converter: TokenizingConverter;
  private readonly resolveFields: ResolveFields;
  private readonly eventBus = new EventBus();
  private source: DataSource | null = null;
  private pipeline: RecordPipeline | null = null;
  private started = false;
  private fields: readonly string[] | null = null;

  constructor(config: RecordImportConfig) {
    if ((config.fields === undefined) === !config.headerLine) {
      throw new Error("Exactly one of 'fields' and 'headerLine' must be configured");
    }
    if (config.numDecoders !== undefined && (!Number.isInteger(config.numDecoders) || config.numDecoders < 1)) {
      throw new Error(`numDecoders must be a positive integer, got ${String(config.numDecoders)}`);
    }
    if (config.fields) {
      validateFields(config.fields);
    }
    this.config = config;
    this.converter = createConverter(config.format, {
      inferTypes: config.inferTypes,
      strictFieldCount: config.strictFieldCount,
      ignoreBlanks: config.ignoreBlanks,
      delimiter: config.delimiter,
    });
    this.resolveFields = new ResolveFields(this.converter, config.fields ?? null);
  }

  /** Set the data source. Returns `this` for chaining. */
  from(source: DataSource): this {
    this.source = source;
    return this;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /**
   * Convert a sample of records without starting the import.
   *
   * Reads the source from the start, so the import itself needs a source
   * that can be read again (`BufferSource`, `FilePathSource`).
   */
  async preview(maxRecords = 10): Promise<PreviewResult> {
    const preview = await new PreviewImport(this.converter, this.resolveFields).execute(
      this.openRecords(false),
      maxRecords,
    );
    this.fields = preview.fields;
    return preview;
  }

  /**
   * Import every record, handing outcomes to `sink`.
   *
   * @returns The single result of the run.
   * @throws Error if no source is configured, the import already started, or the field list is invalid.
   */
  async start(sink: OutcomeSink): Promise<PipelineResult> {
    const pipeline = await this.prepare();
    return pipeline.run(sink);
  }

  /** Import every record as an async iterable of outcomes. See `RecordPipeline.stream()`. */
  async *stream(): AsyncGenerator<ConversionOutcome, void, undefined> {
    const pipeline = await this.prepare();
    yield* pipeline.stream();
  }

  /** Field names in use, once resolved by `start()`, `stream()` or `preview()`. */
  getFields(): readonly string[] | null {
    return this.fields ?? this.config.fields ?? null;
  }

  /** Get current status and progress counters. */
  getStatus(): PipelineStatusResult {
    return this.pipeline?.getStatus() ?? NOT_STARTED;
  }

  private async prepare(): Promise<RecordPipeline> {
    if (this.pipeline) {
      throw new Error(`Cannot start import from status '${this.pipeline.getStatus().status}'`);
    }
    if (this.started) {
      throw new Error('Import has already been started');
    }
    const records = this.openRecords(true);
    this.started = true;

    let fields: readonly string[];
    try {
      fields = await this.resolveFields.execute(records);
    } catch (error) {
      await records.close();
      throw error;
    }
    this.fields = fields;

    this.pipeline = new RecordPipeline({
      converter: this.converter,
      fields,
      numDecoders: this.config.numDecoders,
      ordered: this.config.ordered,
      conversionErrors: this.config.conversionErrors,
      eventBus: this.eventBus,
    }).from(records);
    return this.pipeline;
  }

  private openRecords(tracked: boolean): RecordSource {
    if (!this.source) {
      throw new Error('Source must be configured. Call .from(source) first.');
    }
    return new RecordSource(this.source, {
      encoding: this.config.encoding,
      sizeTracker: tracked ? this.config.sizeTracker : undefined,
    });
  }
}
