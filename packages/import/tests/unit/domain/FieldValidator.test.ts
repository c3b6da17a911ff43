import { describe, it, expect } from 'vitest';
import { normalizeHeader, validateFields } from '../../../src/domain/services/FieldValidator.js';

describe('normalizeHeader', () => {
  it('should trim blanks and a trailing line terminator', () => {
    expect(normalizeHeader([' name ', 'age\r\n', '\tcity\r'])).toEqual(['name', 'age', 'city']);
  });

  it('should keep inner spaces', () => {
    expect(normalizeHeader(['first name'])).toEqual(['first name']);
  });
});

describe('validateFields', () => {
  it('should accept plain and dotted names', () => {
    expect(() => {
      validateFields(['name', 'address.city', 'address.zip', 'tags']);
    }).not.toThrow();
  });

  it('should reject an empty list', () => {
    expect(() => {
      validateFields([]);
    }).toThrow('Field list must contain at least one field');
  });

  it('should reject an empty name with its position', () => {
    expect(() => {
      validateFields(['a', '', 'c']);
    }).toThrow('Field #2 has an empty name');
  });

  it('should reject names starting with $', () => {
    expect(() => {
      validateFields(['$set']);
    }).toThrow("Field '$set' cannot start with '$'");
  });

  it.each(['.a', 'a.'])('should reject %s for its leading or trailing dot', (name) => {
    expect(() => {
      validateFields([name]);
    }).toThrow(`Field '${name}' cannot start or end with '.'`);
  });

  it('should reject consecutive dots', () => {
    expect(() => {
      validateFields(['a..b']);
    }).toThrow("Field 'a..b' cannot contain consecutive '.' characters");
  });

  it('should reject duplicates', () => {
    expect(() => {
      validateFields(['id', 'name', 'id']);
    }).toThrow("Field 'id' is declared more than once");
  });

  it('should reject a name that is a dotted prefix of another', () => {
    expect(() => {
      validateFields(['a.b.c', 'x', 'a.b']);
    }).toThrow("Fields 'a.b' and 'a.b.c' are incompatible");
  });

  it('should not confuse a shared prefix with a parent path', () => {
    expect(() => {
      validateFields(['a', 'a-b', 'ab.c']);
    }).not.toThrow();
  });
});
