import type { PipelineProgress, PipelineStatus } from '../../domain/model/PipelineStatus.js';
import type { PipelineContext } from '../PipelineContext.js';

/** Snapshot returned by `getStatus()`. */
export interface PipelineStatusResult {
  readonly status: PipelineStatus;
  readonly progress: PipelineProgress;
}

/** Use case: read a snapshot of the run's state and counters. */
export class GetPipelineStatus {
  constructor(private readonly ctx: PipelineContext) {}

  execute(): PipelineStatusResult {
    return {
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
    };
  }
}
