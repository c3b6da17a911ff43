import type { ConversionOutcome } from '@recordflow/core';

/** Result of converting a sample of records without running the pipeline. */
export interface PreviewResult {
  /** Field names the records were bound to (from config or the header line). */
  readonly fields: readonly string[];
  /** Outcomes of the sampled records, in input order. */
  readonly outcomes: readonly ConversionOutcome[];
  /** Number of records sampled from the source. */
  readonly totalSampled: number;
}
