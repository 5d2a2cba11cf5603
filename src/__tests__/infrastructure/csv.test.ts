/**
 * CSV Codec Tests
 */

import { describe, it, expect } from '@jest/globals';
import { formatCsvRow, parseCsv, parseCsvRecords } from '../../infrastructure/output/csv.js';

describe('csv', () => {
  it('should quote cells that need it', () => {
    expect(formatCsvRow(['a', 'b,c', 'line\nbreak', ' pad', 'say "hi"'])).toBe(
      'a,"b,c","line\nbreak"," pad","say ""hi"""'
    );
  });

  it('should parse quoted cells, CRLF and blank lines', () => {
    expect(parseCsv('a,b\r\n"x, y","say ""hi"""\n\n')).toEqual([
      ['a', 'b'],
      ['x, y', 'say "hi"'],
    ]);
  });

  it('should keep newlines inside quoted cells', () => {
    expect(parseCsv('id,notes\n1,"two\nlines"\n')).toEqual([
      ['id', 'notes'],
      ['1', 'two\nlines'],
    ]);
  });

  it('should drop a byte order mark', () => {
    expect(parseCsv('\uFEFFid\n1\n')).toEqual([['id'], ['1']]);
  });

  it('should map records by header and fill short rows', () => {
    expect(parseCsvRecords(' x ,y\n1\n2,3')).toEqual([
      { x: '1', y: '' },
      { x: '2', y: '3' },
    ]);
  });

  it('should return no records for empty input', () => {
    expect(parseCsvRecords('')).toEqual([]);
  });
});
