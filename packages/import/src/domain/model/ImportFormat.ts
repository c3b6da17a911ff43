/** Delimited-text dialects with a built-in converter. */
export type ImportFormat = 'tsv' | 'csv';

/** Options shared by every converter. */
export interface ConverterOptions {
  /** Turn numeric and `true`/`false` tokens into numbers and booleans. Default: `false`. */
  readonly inferTypes?: boolean;
  /** Fail a record whose token count differs from the field count. Default: `false`. */
  readonly strictFieldCount?: boolean;
  /** Leave empty tokens out of the document. Default: `false`. */
  readonly ignoreBlanks?: boolean;
  /** Token separator. CSV only; TSV always splits on tabs. Default: `','`. */
  readonly delimiter?: string;
}
