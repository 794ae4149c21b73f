/**
 * Tests for src/tsv.ts and src/template.ts
 */

import { describe, it, expect } from 'vitest';
import { formatTsvField, parseTsv, stringifyTsv } from '../../src/tsv.js';
import { fillTemplate, UnknownPlaceholderError } from '../../src/template.js';

describe('tsv', () => {
  describe('formatTsvField', () => {
    it('should leave plain values unquoted', () => {
      expect(formatTsvField('abc')).toBe('abc');
      expect(formatTsvField(12.5)).toBe('12.5');
      expect(formatTsvField(null)).toBe('');
    });

    it('should quote values with tabs, quotes or line breaks', () => {
      expect(formatTsvField('a\tb')).toBe('"a\tb"');
      expect(formatTsvField('say "hi"')).toBe('"say ""hi"""');
      expect(formatTsvField('a\nb')).toBe('"a\nb"');
    });
  });

  describe('stringifyTsv', () => {
    it('should end every line with a newline', () => {
      expect(stringifyTsv([['date', 'value'], ['2015-01-01', 1], ['2015-01-02', null]])).toBe(
        'date\tvalue\n2015-01-01\t1\n2015-01-02\t\n',
      );
    });
  });

  describe('parseTsv', () => {
    it('should split rows and fields', () => {
      expect(parseTsv('date\tvalue\n2015-01-01\t1\n')).toEqual([
        ['date', 'value'],
        ['2015-01-01', '1'],
      ]);
    });

    it('should keep empty fields and skip blank lines', () => {
      expect(parseTsv('a\t\tc\n\n\r\nd\te\r\n')).toEqual([
        ['a', '', 'c'],
        ['d', 'e'],
      ]);
    });

    it('should unquote quoted fields', () => {
      expect(parseTsv('"a\tb"\t"say ""hi"""\t"x\ny"\n')).toEqual([['a\tb', 'say "hi"', 'x\ny']]);
    });

    it('should read back what stringifyTsv wrote', () => {
      const rows = [
        ['date', 'label'],
        ['2015-01-01', 'multi\nline "quoted"\tvalue'],
      ];
      expect(parseTsv(stringifyTsv(rows))).toEqual(rows);
    });
  });
});

describe('fillTemplate', () => {
  it('should replace placeholders by name', () => {
    expect(fillTemplate('SELECT * FROM {wiki} WHERE ts >= {from}', { wiki: 'enwiki', from: 20150101000000 })).toBe(
      'SELECT * FROM enwiki WHERE ts >= 20150101000000',
    );
  });

  it('should render doubled braces literally', () => {
    expect(fillTemplate('{{"a": {value}}}', { value: 1 })).toBe('{"a": 1}');
  });

  it('should render null as None', () => {
    expect(fillTemplate('{value}', { value: null })).toBe('None');
  });

  it('should reject unknown placeholders', () => {
    expect(() => fillTemplate('{missing}', {})).toThrow(UnknownPlaceholderError);
    expect(() => fillTemplate('{missing}', {})).toThrow('Unknown placeholder "missing".');
  });
});
