import type { RecordSource } from '@recordflow/core';
import type { TokenizingConverter } from '../../domain/ports/TokenizingConverter.js';
import { normalizeHeader, validateFields } from '../../domain/services/FieldValidator.js';

/** Use case: settle the field list, from configuration or from the first line of the input. */
export class ResolveFields {
  constructor(
    private readonly converter: TokenizingConverter,
    private readonly configured: readonly string[] | null,
  ) {}

  /**
   * A configured list is returned as is (the facade validates it at
   * construction). A header line is consumed from `records` so that data
   * records start at sequence index 0.
   *
   * @throws Error if the input has no header line or the header is invalid.
   */
  async execute(records: RecordSource): Promise<readonly string[]> {
    if (this.configured) return this.configured;

    const header = await records.readLine();
    if (header === null) {
      throw new Error('Input is empty: expected a header line');
    }

    const fields = normalizeHeader(this.converter.tokenize(header));
    validateFields(fields);
    return fields;
  }
}
