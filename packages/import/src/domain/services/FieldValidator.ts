/** Strip a trailing line terminator and surrounding blanks from every header token. */
export function normalizeHeader(tokens: readonly string[]): string[] {
  return tokens.map((token) => token.replace(/[\r\n]+$/, '').trim());
}

/**
 * Check a field-name list before any record is bound to it.
 *
 * Rejects an empty list, empty names, names starting with `$`, names with a
 * leading, trailing or doubled `.`, duplicates, and pairs where one name is a
 * dotted prefix of the other (`a` and `a.b` cannot both hold a value).
 *
 * @throws Error describing the first problem found.
 */
export function validateFields(fields: readonly string[]): void {
  if (fields.length === 0) {
    throw new Error('Field list must contain at least one field');
  }

  const seen = new Set<string>();
  for (const [position, field] of fields.entries()) {
    if (field === '') {
      throw new Error(`Field #${String(position + 1)} has an empty name`);
    }
    if (field.startsWith('$')) {
      throw new Error(`Field '${field}' cannot start with '$'`);
    }
    if (field.startsWith('.') || field.endsWith('.')) {
      throw new Error(`Field '${field}' cannot start or end with '.'`);
    }
    if (field.includes('..')) {
      throw new Error(`Field '${field}' cannot contain consecutive '.' characters`);
    }
    if (seen.has(field)) {
      throw new Error(`Field '${field}' is declared more than once`);
    }
    seen.add(field);
  }

  for (const field of fields) {
    let dot = field.indexOf('.');
    while (dot !== -1) {
      const parent = field.slice(0, dot);
      if (seen.has(parent)) {
        throw new Error(`Fields '${parent}' and '${field}' are incompatible`);
      }
      dot = field.indexOf('.', dot + 1);
    }
  }
}
