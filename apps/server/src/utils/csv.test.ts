import { describe, it, expect } from 'vitest';
import { formatCsvCell, parseCsv, toCsv } from './csv';

describe('formatCsvCell', () => {
  it('quotes cells containing separators or quotes', () => {
    expect(formatCsvCell('plain')).toBe('plain');
    expect(formatCsvCell('a,b')).toBe('"a,b"');
    expect(formatCsvCell('say "hi"')).toBe('"say ""hi"""');
    expect(formatCsvCell('two\nlines')).toBe('"two\nlines"');
  });

  it('writes empty cells for missing values', () => {
    expect(formatCsvCell(null)).toBe('');
    expect(formatCsvCell(undefined)).toBe('');
    expect(formatCsvCell(0)).toBe('0');
  });
});

describe('parseCsv', () => {
  it('maps rows onto the header', () => {
    expect(parseCsv('x,y\n1,2\n3,4\n')).toEqual({
      header: ['x', 'y'],
      rows: [{ x: '1', y: '2' }, { x: '3', y: '4' }],
    });
  });

  it('handles CRLF, quoted fields and missing trailing cells', () => {
    const text = 'id,note,extra\r\n1,"a, ""quoted""\nnote",z\r\n2,short\r\n';
    expect(parseCsv(text).rows).toEqual([
      { id: '1', note: 'a, "quoted"\nnote', extra: 'z' },
      { id: '2', note: 'short', extra: '' },
    ]);
  });

  it('skips blank lines and a byte order mark', () => {
    expect(parseCsv('\uFEFFa\n1\n\n2').rows).toEqual([{ a: '1' }, { a: '2' }]);
  });

  it('returns an empty table for empty input', () => {
    expect(parseCsv('')).toEqual({ header: [], rows: [] });
  });
});

describe('toCsv', () => {
  it('writes the header then one line per row', () => {
    expect(toCsv(['a', 'b'], [{ a: 1, b: 'x,y' }, { a: null }])).toBe('a,b\n1,"x,y"\n,\n');
  });
});
