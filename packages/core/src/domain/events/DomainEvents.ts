import type { PipelineProgress } from '../model/PipelineStatus.js';
import type { PipelineStage } from '../errors/PipelineErrors.js';
import type { SourceMetadata } from '../ports/DataSource.js';

/** Emitted when `run()` or `stream()` starts the pipeline. */
export interface PipelineStartedEvent {
  readonly type: 'pipeline:started';
  readonly pipelineId: string;
  readonly format: string;
  readonly numDecoders: number;
  readonly ordered: boolean;
  readonly source: SourceMetadata;
  readonly timestamp: number;
}

/** Emitted when the record source reaches a clean end of input. */
export interface SourceExhaustedEvent {
  readonly type: 'source:exhausted';
  readonly pipelineId: string;
  readonly recordsRead: number;
  readonly bytesRead: number;
  readonly timestamp: number;
}

/** Emitted when the underlying stream fails. */
export interface SourceFailedEvent {
  readonly type: 'source:failed';
  readonly pipelineId: string;
  /** 1-based ordinal of the record being read. */
  readonly ordinal: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for each successfully converted record, in emitted order. */
export interface RecordConvertedEvent {
  readonly type: 'record:converted';
  readonly pipelineId: string;
  readonly recordIndex: number;
  readonly timestamp: number;
}

/** Emitted for each record whose conversion failed, in emitted order. */
export interface RecordFailedEvent {
  readonly type: 'record:failed';
  readonly pipelineId: string;
  readonly recordIndex: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted once when every stage finished without a fatal error. */
export interface PipelineCompletedEvent {
  readonly type: 'pipeline:completed';
  readonly pipelineId: string;
  readonly progress: PipelineProgress;
  readonly timestamp: number;
}

/** Emitted once when a stage reported a fatal error. */
export interface PipelineFailedEvent {
  readonly type: 'pipeline:failed';
  readonly pipelineId: string;
  readonly stage: PipelineStage;
  readonly error: string;
  readonly progress: PipelineProgress;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | PipelineStartedEvent
  | SourceExhaustedEvent
  | SourceFailedEvent
  | RecordConvertedEvent
  | RecordFailedEvent
  | PipelineCompletedEvent
  | PipelineFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
