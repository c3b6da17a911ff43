import type { ConverterOptions, ImportFormat } from '../../domain/model/ImportFormat.js';
import type { TokenizingConverter } from '../../domain/ports/TokenizingConverter.js';
import { TsvConverter } from './TsvConverter.js';
import { CsvConverter } from './CsvConverter.js';

/** Select the converter for a format. Called once per import. */
export function createConverter(format: ImportFormat, options: ConverterOptions = {}): TokenizingConverter {
  switch (format) {
    case 'tsv':
      return new TsvConverter(options);
    case 'csv':
      return new CsvConverter(options);
  }
}
