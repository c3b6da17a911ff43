import type { PipelineProgress } from '../domain/model/PipelineStatus.js';
import type { RecordConverter } from '../domain/ports/RecordConverter.js';
import type { RecordSource } from './RecordSource.js';
import { PipelineStatus, canTransition } from '../domain/model/PipelineStatus.js';
import { EventBus } from './EventBus.js';

/**
 * What happens to a record that fails to convert.
 *
 * - `'continue'`: the failure is delivered as that record's outcome and the run goes on
 * - `'abort'`: the failure is delivered, then ends the run as a fatal decode-stage error
 */
export type ConversionErrorPolicy = 'continue' | 'abort';

/**
 * Mutable state holder shared by the use cases of a single pipeline run.
 *
 * Only the merge loop writes the output counters and only the record source
 * writes the read counters; everything else reads snapshots through
 * `buildProgress()`.
 */
export class PipelineContext {
  readonly pipelineId: string;
  readonly eventBus: EventBus;

  records: RecordSource | null = null;
  status: PipelineStatus = PipelineStatus.CREATED;
  emittedCount = 0;
  failedCount = 0;
  startedAt?: number;
  finishedAt?: number;

  constructor(
    readonly converter: RecordConverter,
    readonly fields: readonly string[],
    readonly numDecoders: number,
    readonly ordered: boolean,
    readonly conversionErrors: ConversionErrorPolicy,
    eventBus?: EventBus,
  ) {
    if (!Number.isInteger(numDecoders) || numDecoders < 1) {
      throw new Error(`numDecoders must be a positive integer, got ${String(numDecoders)}`);
    }
    this.eventBus = eventBus ?? new EventBus();
    this.pipelineId = crypto.randomUUID();
  }

  transitionTo(newStatus: PipelineStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Cannot move pipeline from status '${this.status}' to '${newStatus}'`);
    }
    this.status = newStatus;
  }

  buildProgress(): PipelineProgress {
    const end = this.finishedAt ?? Date.now();
    return {
      recordsRead: this.records?.processed ?? 0,
      bytesRead: this.records?.bytesRead ?? 0,
      emitted: this.emittedCount,
      failed: this.failedCount,
      elapsedMs: this.startedAt !== undefined ? end - this.startedAt : 0,
    };
  }

  assertSourceConfigured(): RecordSource {
    if (!this.records) {
      throw new Error('Source must be configured. Call .from(source) first.');
    }
    return this.records;
  }
}
