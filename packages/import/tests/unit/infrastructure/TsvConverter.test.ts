import { describe, it, expect } from 'vitest';
import { TsvConverter } from '../../../src/infrastructure/converters/TsvConverter.js';

describe('TsvConverter', () => {
  it('should split tokens on tabs', () => {
    expect(new TsvConverter().tokenize('a\tb c\t\td')).toEqual(['a', 'b c', '', 'd']);
  });

  it('should strip a trailing carriage return', () => {
    expect(new TsvConverter().tokenize('1\t2\r')).toEqual(['1', '2']);
  });

  it('should treat quotes and commas as plain text', () => {
    expect(new TsvConverter().tokenize('"x,y"\tz')).toEqual(['"x,y"', 'z']);
  });

  it('should return one empty token for an empty line', () => {
    expect(new TsvConverter().tokenize('')).toEqual(['']);
  });

  it('should convert a record into a document', () => {
    expect(new TsvConverter().convert(['a', 'b'], '1\t2', 0)).toEqual([
      { name: 'a', value: '1' },
      { name: 'b', value: '2' },
    ]);
  });

  it('should apply its options', () => {
    const converter = new TsvConverter({ inferTypes: true, ignoreBlanks: true });
    expect(converter.convert(['a', 'b', 'c'], '1\t\tfalse', 0)).toEqual([
      { name: 'a', value: 1 },
      { name: 'c', value: false },
    ]);
  });

  it('should report its format', () => {
    expect(new TsvConverter().format).toBe('tsv');
  });
});
