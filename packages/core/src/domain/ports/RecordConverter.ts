import type { StructuredDocument } from '../model/Document.js';

/**
 * Capability that turns one raw record into a document.
 *
 * One implementation per text format, selected once when the pipeline is
 * built. Implementations must not mutate `fields`; they signal a bad record
 * by throwing (ideally a `ConversionError`) or rejecting.
 */
export interface RecordConverter {
  /** Short format name used in events and error messages (e.g. `'tsv'`). */
  readonly format: string;
  convert(fields: readonly string[], text: string, index: number): StructuredDocument | Promise<StructuredDocument>;
}
