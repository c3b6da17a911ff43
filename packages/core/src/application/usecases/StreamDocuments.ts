import type { ConversionOutcome } from '../../domain/model/Record.js';
import type { PipelineResult } from '../../domain/model/PipelineResult.js';
import type { PipelineContext } from '../PipelineContext.js';
import type { RecordSource } from '../RecordSource.js';
import type { BoundedQueue } from '../BoundedQueue.js';
import type { RawRecord } from '../../domain/model/Record.js';
import type { OutcomeMerger } from '../OutcomeMerger.js';
import { SourceReadError } from '../../domain/errors/PipelineErrors.js';
import { PipelineStatus } from '../../domain/model/PipelineStatus.js';
import { QuorumAggregator } from '../QuorumAggregator.js';
import { DecodeWorkerPool } from '../DecodeWorkerPool.js';
import { createMerger } from '../OutcomeMerger.js';

/** Receives outcomes in emission order. Awaited, so a slow sink slows the whole pipeline down. */
export type OutcomeSink = (outcome: ConversionOutcome) => void | Promise<void>;

/** Stage result: `undefined` for success, otherwise the error that ended it. */
type StageOutcome = unknown;

/**
 * Use case: read, decode and merge every record into the sink.
 *
 * Two stages run concurrently and report into a quorum of two: the read
 * stage (record source → raw queue) and the decode/merge stage (worker pool →
 * merger → sink). The first fatal error from either closes both queues and
 * releases the merger; the run only resolves once both stages have returned.
 */
export class StreamDocuments {
  private stopped = false;

  constructor(private readonly ctx: PipelineContext) {}

  async execute(sink: OutcomeSink): Promise<PipelineResult> {
    const records = this.ctx.assertSourceConfigured();
    this.ctx.transitionTo(PipelineStatus.RUNNING);
    this.ctx.startedAt = Date.now();

    // Yield to next microtask so handlers registered after run() on the same tick receive this event
    await Promise.resolve();

    this.ctx.eventBus.emit({
      type: 'pipeline:started',
      pipelineId: this.ctx.pipelineId,
      format: this.ctx.converter.format,
      numDecoders: this.ctx.numDecoders,
      ordered: this.ctx.ordered,
      source: records.metadata(),
      timestamp: Date.now(),
    });

    const quorum = new QuorumAggregator(2);
    const merger = createMerger(this.ctx.ordered, this.ctx.numDecoders);
    const pool = new DecodeWorkerPool(this.ctx.numDecoders, this.ctx.converter, (index) => merger.admit(index));

    const reading = this.read(records, pool.input).then((error) => {
      quorum.signal('read', error);
    });
    const decoding = this.decode(pool, merger, sink).then((error) => {
      quorum.signal('decode', error);
    });

    const result = await quorum.wait();
    if (!result.ok) {
      this.stop(pool, merger);
    }
    await Promise.all([reading, decoding]);

    this.finish(result);
    return result;
  }

  /** Read stage. The record source is always closed before the stage reports. */
  private async read(records: RecordSource, input: BoundedQueue<RawRecord>): Promise<StageOutcome> {
    const outcome = await this.pump(records, input);
    try {
      await records.close();
    } catch (error) {
      return outcome ?? error;
    }
    return outcome;
  }

  private async pump(records: RecordSource, input: BoundedQueue<RawRecord>): Promise<StageOutcome> {
    const fields = this.ctx.fields;
    try {
      for (;;) {
        const record = await records.next();
        if (record === null) {
          this.ctx.eventBus.emit({
            type: 'source:exhausted',
            pipelineId: this.ctx.pipelineId,
            recordsRead: records.processed,
            bytesRead: records.bytesRead,
            timestamp: Date.now(),
          });
          return undefined;
        }

        // Queue closed by a downstream failure; that stage reports it.
        if (!(await input.push({ ...record, fields }))) return undefined;
      }
    } catch (error) {
      this.ctx.eventBus.emit({
        type: 'source:failed',
        pipelineId: this.ctx.pipelineId,
        ordinal: error instanceof SourceReadError ? error.ordinal : records.processed + 1,
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      return error;
    } finally {
      input.close();
    }
  }

  private async decode(pool: DecodeWorkerPool, merger: OutcomeMerger, sink: OutcomeSink): Promise<StageOutcome> {
    const workers = pool.run();
    let failure: StageOutcome = undefined;

    try {
      for await (const outcome of pool.output) {
        if (this.stopped) break;
        for (const ready of merger.accept(outcome)) {
          if (this.stopped) break;
          await this.forward(ready, sink);
          if (!ready.ok && this.ctx.conversionErrors === 'abort') {
            throw ready.error;
          }
        }
      }
      if (!this.stopped) merger.finish();
    } catch (error) {
      failure = error;
      this.stop(pool, merger);
    }

    await workers;
    return failure;
  }

  private async forward(outcome: ConversionOutcome, sink: OutcomeSink): Promise<void> {
    this.ctx.emittedCount++;
    if (outcome.ok) {
      this.ctx.eventBus.emit({
        type: 'record:converted',
        pipelineId: this.ctx.pipelineId,
        recordIndex: outcome.index,
        timestamp: Date.now(),
      });
    } else {
      this.ctx.failedCount++;
      this.ctx.eventBus.emit({
        type: 'record:failed',
        pipelineId: this.ctx.pipelineId,
        recordIndex: outcome.index,
        error: outcome.error.message,
        timestamp: Date.now(),
      });
    }
    await sink(outcome);
  }

  /** Close both queues and release the merger. Idempotent. */
  private stop(pool: DecodeWorkerPool, merger: OutcomeMerger): void {
    this.stopped = true;
    pool.input.close();
    pool.output.close();
    merger.release();
  }

  private finish(result: PipelineResult): void {
    this.ctx.finishedAt = Date.now();

    if (result.ok) {
      this.ctx.transitionTo(PipelineStatus.COMPLETED);
      this.ctx.eventBus.emit({
        type: 'pipeline:completed',
        pipelineId: this.ctx.pipelineId,
        progress: this.ctx.buildProgress(),
        timestamp: Date.now(),
      });
      return;
    }

    this.ctx.transitionTo(PipelineStatus.FAILED);
    this.ctx.eventBus.emit({
      type: 'pipeline:failed',
      pipelineId: this.ctx.pipelineId,
      stage: result.error.stage,
      error: result.error.message,
      progress: this.ctx.buildProgress(),
      timestamp: Date.now(),
    });
  }
}
