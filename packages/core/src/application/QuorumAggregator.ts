import { PipelineAggregateError } from '../domain/errors/PipelineErrors.js';
import type { PipelineStage } from '../domain/errors/PipelineErrors.js';
import type { PipelineResult } from '../domain/model/PipelineResult.js';
import { completedResult, failedResult } from '../domain/model/PipelineResult.js';

/**
 * Aggregator lifecycle.
 *
 * - `RUNNING` → `DONE` when every expected signal was a success
 * - `RUNNING` → `FAILED` on the first error, then `FAILED_FINAL` once the
 *   remaining signals have been received and discarded
 */
export type QuorumState = 'RUNNING' | 'DONE' | 'FAILED' | 'FAILED_FINAL';

/**
 * Collects exactly one terminal signal from each of `expected` independent
 * stages and resolves a single `PipelineResult`.
 *
 * The result resolves as soon as the first error arrives; later signals are
 * still accepted (so no stage is left hanging) but do not change it.
 */
export class QuorumAggregator {
  private received = 0;
  private currentState: QuorumState = 'RUNNING';
  private readonly result: Promise<PipelineResult>;
  private readonly settled: Promise<void>;
  private resolveResult: (result: PipelineResult) => void = () => undefined;
  private resolveSettled: () => void = () => undefined;

  constructor(private readonly expected: number) {
    if (!Number.isInteger(expected) || expected < 1) {
      throw new Error(`Quorum size must be a positive integer, got ${String(expected)}`);
    }
    this.result = new Promise<PipelineResult>((resolve) => {
      this.resolveResult = resolve;
    });
    this.settled = new Promise<void>((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get state(): QuorumState {
    return this.currentState;
  }

  /** Number of signals still outstanding. */
  get pending(): number {
    return this.expected - this.received;
  }

  /**
   * Report a stage's terminal status. Pass no error for success.
   *
   * @throws Error if more than `expected` signals are sent.
   */
  signal(stage: PipelineStage, error?: unknown): void {
    if (this.received >= this.expected) {
      throw new Error(`Quorum of ${String(this.expected)} already reached; unexpected signal from '${stage}' stage`);
    }
    this.received++;

    if (error !== undefined && this.currentState === 'RUNNING') {
      this.currentState = 'FAILED';
      this.resolveResult(failedResult(asAggregate(stage, error)));
    }

    if (this.received < this.expected) return;

    if (this.currentState === 'RUNNING') {
      this.currentState = 'DONE';
      this.resolveResult(completedResult);
    } else {
      this.currentState = 'FAILED_FINAL';
    }
    this.resolveSettled();
  }

  /** Resolve with the pipeline result: success after all signals, failure at the first error. */
  wait(): Promise<PipelineResult> {
    return this.result;
  }

  /** Resolve once every expected signal has been received. */
  drained(): Promise<void> {
    return this.settled;
  }
}

function asAggregate(stage: PipelineStage, error: unknown): PipelineAggregateError {
  return error instanceof PipelineAggregateError ? error : new PipelineAggregateError(stage, error);
}
