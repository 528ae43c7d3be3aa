import { describe, it, expect } from 'vitest';
import { decodeCsv, detectDelimiter, inferCsvValue, parseCsvContent } from '../csv-reader';

describe('decodeCsv', () => {
  it('decodes UTF-8 and strips the BOM', () => {
    const buffer = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('名前,年齢', 'utf-8')]);
    expect(decodeCsv(buffer)).toEqual({ text: '名前,年齢', encoding: 'utf-8' });
  });

  it('falls back to Shift_JIS', () => {
    // "あ,1" in Shift_JIS
    const buffer = Buffer.from([0x82, 0xa0, 0x2c, 0x31]);
    expect(decodeCsv(buffer)).toEqual({ text: 'あ,1', encoding: 'shift_jis' });
  });
});

describe('detectDelimiter', () => {
  it('picks the most frequent candidate', () => {
    expect(detectDelimiter('a;b;c\n1;2;3')).toBe(';');
    expect(detectDelimiter('a\tb\n1\t2')).toBe('\t');
  });

  it('defaults to comma', () => {
    expect(detectDelimiter('single')).toBe(',');
  });

  it('samples the first lines of a carriage-return file', () => {
    expect(detectDelimiter('a;b\r1;2\r3;4\r5;6\r7;8\r9,9,9,9,9,9')).toBe(';');
  });
});

describe('parseCsvContent', () => {
  it('splits records and fields', () => {
    expect(parseCsvContent('a,b\n1,2\n', ',')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('handles quotes, escaped quotes and embedded newlines', () => {
    expect(parseCsvContent('"x,y","say ""hi""","line1\nline2"', ',')).toEqual([
      ['x,y', 'say "hi"', 'line1\nline2'],
    ]);
  });

  it('keeps blank lines and surrounding spaces', () => {
    expect(parseCsvContent('a, b\r\n\r\nc,d', ',')).toEqual([['a', ' b'], [''], ['c', 'd']]);
  });

  it('breaks records on a bare carriage return', () => {
    expect(parseCsvContent('id,name\r1,Ann\r2,Bob\r', ',')).toEqual([
      ['id', 'name'],
      ['1', 'Ann'],
      ['2', 'Bob'],
    ]);
    expect(parseCsvContent('a\r\rb\r\nc', ',')).toEqual([['a'], [''], ['b'], ['c']]);
  });

  it('keeps a carriage return inside quotes', () => {
    expect(parseCsvContent('"x\ry",z', ',')).toEqual([['x\ry', 'z']]);
  });

  it('keeps ragged records as they are', () => {
    expect(parseCsvContent('a,b,c\n1,2', ',').map((r) => r.length)).toEqual([3, 2]);
  });
});

describe('inferCsvValue', () => {
  it('maps empty fields to null', () => {
    expect(inferCsvValue('')).toBeNull();
  });

  it('infers numbers and booleans', () => {
    expect(inferCsvValue('42')).toBe(42);
    expect(inferCsvValue('-1.5')).toBe(-1.5);
    expect(inferCsvValue('TRUE')).toBe(true);
  });

  it('keeps codes with leading zeros and padded numbers as text', () => {
    expect(inferCsvValue('007')).toBe('007');
    expect(inferCsvValue(' 12')).toBe(' 12');
    expect(inferCsvValue('1,000')).toBe('1,000');
  });
});
