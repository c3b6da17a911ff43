import type { ConversionError } from '../errors/PipelineErrors.js';
import type { StructuredDocument } from './Document.js';

/** One delimiter-terminated record as produced by the record source, before field binding. */
export interface SourceRecord {
  /** Zero-based sequence index, assigned in read order with no gaps. */
  readonly index: number;
  /** Record text without its terminating delimiter. */
  readonly text: string;
}

/** An unparsed record handed to exactly one decode worker. */
export interface RawRecord extends SourceRecord {
  /** Shared, read-only field-name list the record's tokens are bound to. */
  readonly fields: readonly string[];
}

/** Conversion succeeded. */
export interface ConvertedOutcome {
  readonly index: number;
  readonly ok: true;
  readonly document: StructuredDocument;
}

/** Conversion failed. The error travels with the record instead of stopping the pipeline. */
export interface FailedOutcome {
  readonly index: number;
  readonly ok: false;
  readonly error: ConversionError;
}

/** Per-record result of applying a converter. Exactly one per `RawRecord`. */
export type ConversionOutcome = ConvertedOutcome | FailedOutcome;

export function convertedOutcome(index: number, document: StructuredDocument): ConvertedOutcome {
  return { index, ok: true, document };
}

export function failedOutcome(index: number, error: ConversionError): FailedOutcome {
  return { index, ok: false, error };
}
