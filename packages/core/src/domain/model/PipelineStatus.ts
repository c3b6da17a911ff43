/**
 * Finite state machine for a pipeline run.
 *
 * Valid transitions:
 * - `CREATED` → `RUNNING`
 * - `RUNNING` → `COMPLETED` | `FAILED`
 * - `COMPLETED`, `FAILED` → (terminal)
 */
export const PipelineStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type PipelineStatus = (typeof PipelineStatus)[keyof typeof PipelineStatus];

const VALID_TRANSITIONS: Record<PipelineStatus, readonly PipelineStatus[]> = {
  [PipelineStatus.CREATED]: [PipelineStatus.RUNNING],
  [PipelineStatus.RUNNING]: [PipelineStatus.COMPLETED, PipelineStatus.FAILED],
  [PipelineStatus.COMPLETED]: [],
  [PipelineStatus.FAILED]: [],
};

/** Check whether a state transition is valid according to the pipeline lifecycle FSM. */
export function canTransition(from: PipelineStatus, to: PipelineStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Progress counters for a pipeline run. */
export interface PipelineProgress {
  /** Records produced by the record source so far. */
  readonly recordsRead: number;
  /** Bytes consumed from the underlying stream, delimiters included. */
  readonly bytesRead: number;
  /** Outcomes forwarded to the consumer. */
  readonly emitted: number;
  /** Forwarded outcomes that carry a conversion error. */
  readonly failed: number;
  readonly elapsedMs: number;
}
