import type { RawRecord, ConversionOutcome } from '../domain/model/Record.js';
import type { RecordConverter } from '../domain/ports/RecordConverter.js';
import { convertedOutcome, failedOutcome } from '../domain/model/Record.js';
import { ConversionError } from '../domain/errors/PipelineErrors.js';
import { BoundedQueue } from './BoundedQueue.js';

/** Resolves once a record may be converted. */
export type AdmissionGate = (index: number) => Promise<void>;

const admitAll: AdmissionGate = () => Promise.resolve();

/**
 * Fixed set of concurrent decode workers.
 *
 * Workers share one bounded input queue of raw records and one bounded
 * output queue of outcomes, both sized to the pool. Every dequeued record
 * yields exactly one outcome; conversion errors are carried in the outcome
 * and never stop a worker. The output queue closes when the last worker exits.
 */
export class DecodeWorkerPool {
  readonly input: BoundedQueue<RawRecord>;
  readonly output: BoundedQueue<ConversionOutcome>;
  private started = false;

  constructor(
    readonly size: number,
    private readonly converter: RecordConverter,
    private readonly admit: AdmissionGate = admitAll,
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Decoder pool size must be a positive integer, got ${String(size)}`);
    }
    this.input = new BoundedQueue<RawRecord>(size);
    this.output = new BoundedQueue<ConversionOutcome>(size);
  }

  /**
   * Spawn the workers. Resolves once every worker has exited, which happens
   * when the input queue is closed and drained.
   */
  async run(): Promise<void> {
    if (this.started) {
      throw new Error('Decoder pool has already been started');
    }
    this.started = true;

    try {
      await Promise.all(Array.from({ length: this.size }, () => this.work()));
    } finally {
      this.output.close();
    }
  }

  private async work(): Promise<void> {
    for (;;) {
      const next = await this.input.shift();
      if (next.done) return;

      const record = next.value;
      await this.admit(record.index);

      // Nobody is listening any more: drain without converting.
      if (this.output.closed) continue;

      await this.output.push(await this.convert(record));
    }
  }

  private async convert(record: RawRecord): Promise<ConversionOutcome> {
    try {
      const document = await this.converter.convert(record.fields, record.text, record.index);
      return convertedOutcome(record.index, document);
    } catch (error) {
      return failedOutcome(record.index, ConversionError.from(record.index, error));
    }
  }
}
