import type { DocumentField, FieldValue, StructuredDocument } from '@recordflow/core';
import { ConversionError } from '@recordflow/core';
import type { ConverterOptions } from '../model/ImportFormat.js';

type BindOptions = Pick<ConverterOptions, 'inferTypes' | 'strictFieldCount' | 'ignoreBlanks'>;

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Guess the type of a token: integers and decimals become numbers, `true`
 * and `false` become booleans, anything else stays a string. Numbers whose
 * magnitude is beyond the safe-integer range, `Infinity` included, stay strings.
 */
export function inferValue(token: string): FieldValue {
  if (INTEGER.test(token)) {
    const value = Number(token);
    return Number.isSafeInteger(value) ? value : token;
  }
  if (DECIMAL.test(token)) {
    const value = Number(token);
    return Number.isFinite(value) && Math.abs(value) <= Number.MAX_SAFE_INTEGER ? value : token;
  }
  if (token === 'true') return true;
  if (token === 'false') return false;
  return token;
}

/**
 * Bind the tokens of one record to field names.
 *
 * Tokens are bound positionally. A dotted field name (`address.city`) nests
 * the value in a sub-document. Tokens beyond the field list are named
 * `field<position>`; if that name is already a declared field the record
 * fails.
 *
 * @throws ConversionError when the record cannot be bound.
 */
export function tokensToDocument(
  fields: readonly string[],
  tokens: readonly string[],
  index: number,
  options: BindOptions = {},
): StructuredDocument {
  if (options.strictFieldCount && tokens.length !== fields.length) {
    throw new ConversionError(
      index,
      `record ${String(index)} has ${String(tokens.length)} field(s), expected ${String(fields.length)}`,
    );
  }

  const document: DocumentField[] = [];
  const nested = new Map<string, DocumentField[]>();

  for (const [position, token] of tokens.entries()) {
    if (options.ignoreBlanks && token === '') continue;

    const value = options.inferTypes ? inferValue(token) : token;
    const field = fields[position];

    if (field === undefined) {
      const name = `field${String(position)}`;
      if (fields.includes(name)) {
        throw new ConversionError(
          index,
          `duplicate field name '${name}' for token #${String(position + 1)} in record ${String(index)}`,
        );
      }
      document.push({ name, value });
    } else if (field.includes('.')) {
      setNestedValue(document, nested, field, value);
    } else {
      document.push({ name: field, value });
    }
  }

  return document;
}

function setNestedValue(
  root: DocumentField[],
  nested: Map<string, DocumentField[]>,
  path: string,
  value: FieldValue,
): void {
  const segments = path.split('.');
  const leaf = segments.pop() ?? path;

  let container = root;
  let prefix = '';
  for (const segment of segments) {
    prefix = prefix === '' ? segment : `${prefix}.${segment}`;
    let child = nested.get(prefix);
    if (!child) {
      child = [];
      container.push({ name: segment, value: child });
      nested.set(prefix, child);
    }
    container = child;
  }

  container.push({ name: leaf, value });
}
