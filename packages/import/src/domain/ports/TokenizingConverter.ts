import type { RecordConverter } from '@recordflow/core';

/** A converter that can also split a line into raw tokens, e.g. to read a header row. */
export interface TokenizingConverter extends RecordConverter {
  tokenize(text: string): string[];
}
