import { availableParallelism } from 'node:os';
import type { ConversionOutcome } from './domain/model/Record.js';
import type { PipelineResult } from './domain/model/PipelineResult.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { RecordConverter } from './domain/ports/RecordConverter.js';
import type { SizeTracker } from './domain/ports/SizeTracker.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { ConversionErrorPolicy } from './application/PipelineContext.js';
import type { OutcomeSink } from './application/usecases/StreamDocuments.js';
import type { PipelineStatusResult } from './application/usecases/GetPipelineStatus.js';
import type { EventBus } from './application/EventBus.js';
import { PipelineContext } from './application/PipelineContext.js';
import { RecordSource } from './application/RecordSource.js';
import { BoundedQueue } from './application/BoundedQueue.js';
import { StreamDocuments } from './application/usecases/StreamDocuments.js';
import { GetPipelineStatus } from './application/usecases/GetPipelineStatus.js';

/** Configuration for a record pipeline. */
export interface RecordPipelineConfig {
  /** Format-specific converter applied to every record. */
  readonly converter: RecordConverter;
  /** Field names records are bound to. Must already be validated; never mutated. */
  readonly fields: readonly string[];
  /** Number of concurrent decode workers. Default: `os.availableParallelism()`. */
  readonly numDecoders?: number;
  /** When `true`, outcomes are emitted in input order. Default: `false` (completion order). */
  readonly ordered?: boolean;
  /** Whether a failed conversion ends the run. Default: `'continue'`. */
  readonly conversionErrors?: ConversionErrorPolicy;
  /** Single-byte record terminator, used when `from()` receives a `DataSource`. Default: `'\n'`. */
  readonly delimiter?: string;
  /** Text encoding, used when `from()` receives a `DataSource`. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Byte-count observer, used when `from()` receives a `DataSource`. */
  readonly sizeTracker?: SizeTracker;
  /** Share an event bus with an enclosing facade. Default: a new bus. */
  readonly eventBus?: EventBus;
}

/**
 * Facade over one concurrent decode run: read → decode (N workers) → merge.
 *
 * Delegates each operation to a use case in `application/usecases/`. A
 * pipeline instance runs once.
 *
 * @example
 * ```typescript
 * const pipeline = new RecordPipeline({ converter, fields: ['a', 'b'], numDecoders: 4, ordered: true });
 * pipeline.from(new FilePathSource('./data.tsv'));
 * const result = await pipeline.run((outcome) => { if (outcome.ok) docs.push(outcome.document); });
 * ```
 */
export class RecordPipeline {
  private readonly ctx: PipelineContext;
  private readonly sourceOptions: Pick<RecordPipelineConfig, 'delimiter' | 'encoding' | 'sizeTracker'>;

  constructor(config: RecordPipelineConfig) {
    this.ctx = new PipelineContext(
      config.converter,
      config.fields,
      config.numDecoders ?? availableParallelism(),
      config.ordered ?? false,
      config.conversionErrors ?? 'continue',
      config.eventBus,
    );
    this.sourceOptions = {
      delimiter: config.delimiter,
      encoding: config.encoding,
      sizeTracker: config.sizeTracker,
    };
  }

  /**
   * Set the input. Accepts a raw `DataSource`, or a `RecordSource` that has
   * already been advanced past a header row. Returns `this` for chaining.
   */
  from(source: DataSource | RecordSource): this {
    this.ctx.records = source instanceof RecordSource ? source : new RecordSource(source, this.sourceOptions);
    return this;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Run the pipeline, handing every outcome to `sink` in emission order.
   *
   * Resolves with exactly one `PipelineResult` once every stage has stopped.
   * Per-record conversion failures reach the sink as failed outcomes and do
   * not fail the run unless `conversionErrors` is `'abort'`.
   *
   * @throws Error if no source is configured or the pipeline has already run.
   */
  async run(sink: OutcomeSink): Promise<PipelineResult> {
    return new StreamDocuments(this.ctx).execute(sink);
  }

  /**
   * Run the pipeline as an async iterable of outcomes.
   *
   * The iterator throws the run's `PipelineAggregateError` after the last
   * outcome if a stage failed. Leaving the loop early stops the pipeline.
   */
  async *stream(): AsyncGenerator<ConversionOutcome, void, undefined> {
    const output = new BoundedQueue<ConversionOutcome>(this.ctx.numDecoders);
    const running = this.run(async (outcome) => {
      if (!(await output.push(outcome))) {
        throw new Error('Outcome stream was closed by its consumer');
      }
    }).finally(() => {
      output.close();
    });

    let result: PipelineResult | undefined;
    try {
      yield* output;
    } finally {
      output.close();
      result = await running;
    }
    if (result !== undefined && !result.ok) throw result.error;
  }

  /** Get current status and progress counters. */
  getStatus(): PipelineStatusResult {
    return new GetPipelineStatus(this.ctx).execute();
  }

  /** Get the unique pipeline identifier (UUID). */
  getPipelineId(): string {
    return this.ctx.pipelineId;
  }
}
