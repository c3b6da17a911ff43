import Papa from 'papaparse';
import type { StructuredDocument } from '@recordflow/core';
import { ConversionError } from '@recordflow/core';
import type { ConverterOptions } from '../../domain/model/ImportFormat.js';
import type { TokenizingConverter } from '../../domain/ports/TokenizingConverter.js';
import { tokensToDocument } from '../../domain/services/TokenBinder.js';

/**
 * Converter for comma-separated records using PapaParse.
 *
 * Honours quoting within a record. Records are split on line terminators
 * before they get here, so a quoted value cannot span lines.
 */
export class CsvConverter implements TokenizingConverter {
  readonly format = 'csv';
  private readonly delimiter: string;

  constructor(private readonly options: ConverterOptions = {}) {
    this.delimiter = options.delimiter ?? ',';
  }

  tokenize(text: string): string[] {
    const line = text.replace(/\r$/, '');
    if (line === '') return [''];

    const result = Papa.parse<string[]>(line, {
      delimiter: this.delimiter,
      header: false,
      skipEmptyLines: false,
      dynamicTyping: false,
    });

    const [error] = result.errors;
    if (error) {
      throw new Error(error.message);
    }
    return result.data[0] ?? [''];
  }

  convert(fields: readonly string[], text: string, index: number): StructuredDocument {
    let tokens: string[];
    try {
      tokens = this.tokenize(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConversionError(index, `malformed CSV in record ${String(index)}: ${reason}`, { cause: error });
    }
    return tokensToDocument(fields, tokens, index, this.options);
  }
}
