/** Value bound to a field. Dotted field names produce nested documents. */
export type FieldValue = string | number | boolean | StructuredDocument;

/** A single `(name, value)` pair of a document. */
export interface DocumentField {
  readonly name: string;
  readonly value: FieldValue;
}

/** Ordered list of fields. Order follows the field-name list the record was bound to. */
export type StructuredDocument = readonly DocumentField[];

/** Plain-object form of a document value. */
export type PlainValue = string | number | boolean | PlainDocument;

export interface PlainDocument {
  [name: string]: PlainValue;
}

function isDocument(value: FieldValue): value is StructuredDocument {
  return Array.isArray(value);
}

/**
 * Convert a document to a plain object, recursing into nested documents.
 * Key order follows field order.
 */
export function toPlainObject(document: StructuredDocument): PlainDocument {
  const result: PlainDocument = {};
  for (const { name, value } of document) {
    result[name] = isDocument(value) ? toPlainObject(value) : value;
  }
  return result;
}

/** Look up a top-level field value by name. */
export function getField(document: StructuredDocument, name: string): FieldValue | undefined {
  return document.find((field) => field.name === name)?.value;
}
