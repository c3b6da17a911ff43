// Main entry point
export { RecordImport } from './RecordImport.js';
export type { RecordImportConfig } from './RecordImport.js';

// Domain model
export type { ImportFormat, ConverterOptions } from './domain/model/ImportFormat.js';
export type { PreviewResult } from './domain/model/PreviewResult.js';

// Domain services
export { validateFields, normalizeHeader } from './domain/services/FieldValidator.js';
export { tokensToDocument, inferValue } from './domain/services/TokenBinder.js';

// Domain ports
export type { TokenizingConverter } from './domain/ports/TokenizingConverter.js';

// Infrastructure adapters (built-in converters)
export { TsvConverter } from './infrastructure/converters/TsvConverter.js';
export { CsvConverter } from './infrastructure/converters/CsvConverter.js';
export { createConverter } from './infrastructure/converters/createConverter.js';

// Re-export commonly used types from @recordflow/core for convenience
export type {
  RawRecord,
  SourceRecord,
  ConversionOutcome,
  ConvertedOutcome,
  FailedOutcome,
  StructuredDocument,
  DocumentField,
  FieldValue,
  PlainDocument,
  PipelineResult,
  PipelineProgress,
  PipelineStatusResult,
  ConversionErrorPolicy,
  OutcomeSink,
  DataSource,
  SourceMetadata,
  RecordConverter,
  SizeTracker,
  DomainEvent,
  EventType,
  EventPayload,
} from '@recordflow/core';

export {
  PipelineStatus,
  SourceReadError,
  ConversionError,
  PipelineAggregateError,
  toPlainObject,
  getField,
  BufferSource,
  FilePathSource,
  StreamSource,
  ByteCounter,
  RecordPipeline,
} from '@recordflow/core';
