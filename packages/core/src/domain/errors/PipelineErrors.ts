/** Stage of the pipeline that reported a fatal error. */
export type PipelineStage = 'read' | 'decode';

/** I/O failure of the underlying stream while reading a record. Fatal to the pipeline. */
export class SourceReadError extends Error {
  /** 1-based ordinal of the record that was being read. */
  readonly ordinal: number;

  constructor(ordinal: number, cause: unknown) {
    super(`read error on entry #${String(ordinal)}: ${describe(cause)}`, { cause });
    this.name = 'SourceReadError';
    this.ordinal = ordinal;
  }
}

/**
 * A single record could not be converted into a document.
 *
 * Carried as a value in the record's `ConversionOutcome`; only fatal when the
 * pipeline runs with `conversionErrors: 'abort'`.
 */
export class ConversionError extends Error {
  /** Sequence index of the record that failed. */
  readonly index: number;

  constructor(index: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversionError';
    this.index = index;
  }

  /** Wrap anything a converter threw. `ConversionError` instances pass through unchanged. */
  static from(index: number, error: unknown): ConversionError {
    if (error instanceof ConversionError) return error;
    return new ConversionError(index, `conversion failed for record ${String(index)}: ${describe(error)}`, {
      cause: error,
    });
  }
}

/** The single terminal error of a failed pipeline run. Wraps the first fatal error observed. */
export class PipelineAggregateError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, cause: unknown) {
    super(`${stage} stage failed: ${describe(cause)}`, { cause });
    this.name = 'PipelineAggregateError';
    this.stage = stage;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
