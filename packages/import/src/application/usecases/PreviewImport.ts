import type { ConversionOutcome, RecordSource } from '@recordflow/core';
import { ConversionError, convertedOutcome, failedOutcome } from '@recordflow/core';
import type { PreviewResult } from '../../domain/model/PreviewResult.js';
import type { TokenizingConverter } from '../../domain/ports/TokenizingConverter.js';
import type { ResolveFields } from './ResolveFields.js';

/** Use case: convert the first records of the input one by one, without the worker pool. */
export class PreviewImport {
  constructor(
    private readonly converter: TokenizingConverter,
    private readonly resolveFields: ResolveFields,
  ) {}

  /** Reads at most `maxRecords` records, then closes `records`. */
  async execute(records: RecordSource, maxRecords = 10): Promise<PreviewResult> {
    try {
      return await this.sample(records, maxRecords);
    } finally {
      await records.close();
    }
  }

  private async sample(records: RecordSource, maxRecords: number): Promise<PreviewResult> {
    const fields = await this.resolveFields.execute(records);
    const outcomes: ConversionOutcome[] = [];

    while (outcomes.length < maxRecords) {
      const record = await records.next();
      if (record === null) break;

      try {
        const document = await this.converter.convert(fields, record.text, record.index);
        outcomes.push(convertedOutcome(record.index, document));
      } catch (error) {
        outcomes.push(failedOutcome(record.index, ConversionError.from(record.index, error)));
      }
    }

    return { fields, outcomes, totalSampled: outcomes.length };
  }
}
