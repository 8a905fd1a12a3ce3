import { describe, it, expect } from 'vitest';
import { Lexer, tokenize } from '../src/parser/lexer.js';

describe('Lexer', () => {
  describe('basic tokenization', () => {
    it('should tokenize an empty string', () => {
      expect(new Lexer('').tokenize()).toHaveLength(0);
    });

    it('should skip blank lines but keep line numbers', () => {
      const records = tokenize('\n\n  \n#5\n');
      expect(records).toEqual([{ kind: 'time', ticks: 5, line: 4, text: '#5' }]);
    });

    it('should handle CRLF line endings', () => {
      const records = tokenize('#1\r\n1!\r\n');
      expect(records.map(r => r.kind)).toEqual(['time', 'scalar']);
      expect(records[1]).toEqual({ kind: 'scalar', value: '1', id: '!', line: 2, text: '1!' });
    });
  });

  describe('keywords', () => {
    it('should split a declaration into words', () => {
      const [record] = tokenize('$var wire 8 # data [7:0] $end');
      expect(record).toEqual({
        kind: 'keyword',
        keyword: 'var',
        args: ['wire', '8', '#', 'data', '[7:0]', '$end'],
        line: 1,
        text: '$var wire 8 # data [7:0] $end',
      });
    });

    it('should accept indented keywords', () => {
      const [record] = tokenize('   $enddefinitions $end');
      expect(record.kind).toBe('keyword');
      if (record.kind === 'keyword') {
        expect(record.keyword).toBe('enddefinitions');
        expect(record.args).toEqual(['$end']);
      }
    });
  });

  describe('value changes', () => {
    it('should tokenize scalar changes in every state', () => {
      const records = tokenize('0!\n1"\nx#\nX$\nz%\nZ&');
      expect(records.map(r => (r.kind === 'scalar' ? r.value + r.id : r.kind))).toEqual([
        '0!', '1"', 'x#', 'X$', 'z%', 'Z&',
      ]);
    });

    it('should allow multi-character identifiers', () => {
      const [record] = tokenize('1!a');
      expect(record).toMatchObject({ kind: 'scalar', value: '1', id: '!a' });
    });

    it('should tokenize vector changes', () => {
      const records = tokenize('b1010 #\nB0x1z "');
      expect(records[0]).toMatchObject({ kind: 'vector', bits: '1010', id: '#' });
      expect(records[1]).toMatchObject({ kind: 'vector', bits: '0x1z', id: '"' });
    });

    it('should tokenize real changes', () => {
      const [record] = tokenize('r3.14 %');
      expect(record).toMatchObject({ kind: 'real', value: '3.14', id: '%' });
    });
  });

  describe('other lines', () => {
    it('should keep unsupported values as text', () => {
      const records = tokenize('b102 #\nu!\n#abc');
      expect(records.map(r => r.kind)).toEqual(['text', 'text', 'text']);
    });

    it('should keep the source text of every record', () => {
      // A timescale entry looks like a scalar change
      const [record] = tokenize('\t1ps');
      expect(record.kind).toBe('scalar');
      expect(record.text).toBe('1ps');
    });
  });
});
