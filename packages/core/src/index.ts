// Main entry point
export { RecordPipeline } from './RecordPipeline.js';
export type { RecordPipelineConfig } from './RecordPipeline.js';

// Domain model
export type {
  SourceRecord,
  RawRecord,
  ConversionOutcome,
  ConvertedOutcome,
  FailedOutcome,
} from './domain/model/Record.js';
export { convertedOutcome, failedOutcome } from './domain/model/Record.js';
export type {
  StructuredDocument,
  DocumentField,
  FieldValue,
  PlainDocument,
  PlainValue,
} from './domain/model/Document.js';
export { toPlainObject, getField } from './domain/model/Document.js';
export type { PipelineResult } from './domain/model/PipelineResult.js';
export { PipelineStatus } from './domain/model/PipelineStatus.js';
export type { PipelineProgress } from './domain/model/PipelineStatus.js';

// Errors
export { SourceReadError, ConversionError, PipelineAggregateError } from './domain/errors/PipelineErrors.js';
export type { PipelineStage } from './domain/errors/PipelineErrors.js';

// Use case result types
export type { OutcomeSink } from './application/usecases/StreamDocuments.js';
export type { PipelineStatusResult } from './application/usecases/GetPipelineStatus.js';

// Pipeline building blocks (for custom multi-stage pipelines)
export { RecordSource } from './application/RecordSource.js';
export type { RecordSourceOptions } from './application/RecordSource.js';
export { BoundedQueue } from './application/BoundedQueue.js';
export { QuorumAggregator } from './application/QuorumAggregator.js';
export type { QuorumState } from './application/QuorumAggregator.js';
export { DecodeWorkerPool } from './application/DecodeWorkerPool.js';
export type { AdmissionGate } from './application/DecodeWorkerPool.js';
export { OrderedMerger, UnorderedMerger, createMerger } from './application/OutcomeMerger.js';
export type { OutcomeMerger } from './application/OutcomeMerger.js';
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorReporter } from './application/EventBus.js';
export type { ConversionErrorPolicy } from './application/PipelineContext.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { RecordConverter } from './domain/ports/RecordConverter.js';
export type { SizeTracker } from './domain/ports/SizeTracker.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  PipelineStartedEvent,
  SourceExhaustedEvent,
  SourceFailedEvent,
  RecordConvertedEvent,
  RecordFailedEvent,
  PipelineCompletedEvent,
  PipelineFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in sources and trackers)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { ByteCounter } from './infrastructure/tracking/ByteCounter.js';
