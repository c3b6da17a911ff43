import type { StructuredDocument } from '@recordflow/core';
import type { ConverterOptions } from '../../domain/model/ImportFormat.js';
import type { TokenizingConverter } from '../../domain/ports/TokenizingConverter.js';
import { tokensToDocument } from '../../domain/services/TokenBinder.js';

const TOKEN_SEPARATOR = '\t';

/** Converter for tab-separated records. Tokens are never quoted or escaped. */
export class TsvConverter implements TokenizingConverter {
  readonly format = 'tsv';

  constructor(private readonly options: ConverterOptions = {}) {}

  tokenize(text: string): string[] {
    return text.replace(/\r$/, '').split(TOKEN_SEPARATOR);
  }

  convert(fields: readonly string[], text: string, index: number): StructuredDocument {
    return tokensToDocument(fields, this.tokenize(text), index, this.options);
  }
}
