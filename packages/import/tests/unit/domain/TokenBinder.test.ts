import { describe, it, expect } from 'vitest';
import { ConversionError, toPlainObject } from '@recordflow/core';
import type { FieldValue } from '@recordflow/core';
import { inferValue, tokensToDocument } from '../../../src/domain/services/TokenBinder.js';

const inferenceCases: [string, FieldValue][] = [
  ['42', 42],
  ['-7', -7],
  ['007', 7],
  ['-3.5', -3.5],
  ['.25', 0.25],
  ['1e3', 1000],
  ['true', true],
  ['false', false],
  ['', ''],
  ['abc', 'abc'],
  ['TRUE', 'TRUE'],
  ['12abc', '12abc'],
];

describe('inferValue', () => {
  it.each(inferenceCases)('should read %j as %j', (token, expected) => {
    expect(inferValue(token)).toBe(expected);
  });

  it('should keep integers beyond the safe range as strings', () => {
    expect(inferValue('9007199254740993')).toBe('9007199254740993');
  });

  it.each(['1e400', '-1e400', '12345678901234567890.5'])('should keep the out-of-range decimal %s as a string', (token) => {
    expect(inferValue(token)).toBe(token);
  });
});

describe('tokensToDocument', () => {
  it('should bind tokens to fields in order', () => {
    expect(tokensToDocument(['a', 'b'], ['1', '2'], 0)).toEqual([
      { name: 'a', value: '1' },
      { name: 'b', value: '2' },
    ]);
  });

  it('should leave missing trailing fields out', () => {
    expect(tokensToDocument(['a', 'b', 'c'], ['1'], 0)).toEqual([{ name: 'a', value: '1' }]);
  });

  it('should name extra tokens by position', () => {
    expect(tokensToDocument(['a'], ['1', '2', '3'], 0)).toEqual([
      { name: 'a', value: '1' },
      { name: 'field1', value: '2' },
      { name: 'field2', value: '3' },
    ]);
  });

  it('should fail when a positional name collides with a declared field', () => {
    const bind = (): unknown => tokensToDocument(['field1'], ['x', 'y'], 6);

    expect(bind).toThrow(ConversionError);
    expect(bind).toThrow("duplicate field name 'field1' for token #2 in record 6");
  });

  it('should nest values of dotted fields', () => {
    const document = tokensToDocument(['name', 'address.city', 'address.geo.lat', 'address.zip'], [
      'Ann',
      'Lyon',
      '45.7',
      '69001',
    ], 0);

    expect(toPlainObject(document)).toEqual({
      name: 'Ann',
      address: { city: 'Lyon', geo: { lat: '45.7' }, zip: '69001' },
    });
    expect(document.map((f) => f.name)).toEqual(['name', 'address']);
  });

  it('should infer types when asked', () => {
    const document = tokensToDocument(['n', 'ok', 's'], ['12', 'true', 'x'], 0, { inferTypes: true });

    expect(toPlainObject(document)).toEqual({ n: 12, ok: true, s: 'x' });
  });

  it('should drop blank tokens when asked', () => {
    const document = tokensToDocument(['a', 'b', 'c'], ['1', '', '3'], 0, { ignoreBlanks: true });

    expect(document).toEqual([
      { name: 'a', value: '1' },
      { name: 'c', value: '3' },
    ]);
  });

  describe('strictFieldCount', () => {
    const mismatches: [string[], string][] = [
      [['5'], 'record 3 has 1 field(s), expected 2'],
      [['5', '6', '7'], 'record 3 has 3 field(s), expected 2'],
    ];

    it.each(mismatches)('should reject %j', (tokens, message) => {
      const bind = (): unknown => tokensToDocument(['a', 'b'], tokens, 3, { strictFieldCount: true });

      expect(bind).toThrow(ConversionError);
      expect(bind).toThrow(message);
    });

    it('should accept a matching count', () => {
      expect(tokensToDocument(['a', 'b'], ['5', '6'], 3, { strictFieldCount: true })).toHaveLength(2);
    });

    it('should carry the record index on the error', () => {
      try {
        tokensToDocument(['a', 'b'], ['5'], 9, { strictFieldCount: true });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConversionError);
        if (error instanceof ConversionError) expect(error.index).toBe(9);
      }
    });
  });
});
