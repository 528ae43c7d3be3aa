import { describe, it, expect } from 'vitest';
import { LEVEL2_CAPABILITIES } from '@tabaudit/shared';
import { AuditConfigurationError } from '../../../common/errors/audit-errors';
import { CheckerFactory } from '../checker.factory';
import { CsvFormatHandler } from '../handlers/csv-format.handler';
import { XlsFormatHandler } from '../handlers/xls-format.handler';
import { XlsxFormatHandler } from '../handlers/xlsx-format.handler';
import { stubOracle } from './check-fixtures';

const factory = new CheckerFactory(stubOracle(), new CsvFormatHandler(), new XlsFormatHandler(), new XlsxFormatHandler());

describe('CheckerFactory', () => {
  it('picks the handler by extension, ignoring case', () => {
    expect(factory.resolve('/data/survey.CSV', 1).format).toBe('csv');
    expect(factory.resolve('book.xls', 1).format).toBe('xls');
    expect(factory.resolve('book.xlsx', 3).format).toBe('xlsx');
  });

  it('builds the capability table of the requested level', () => {
    const checker = factory.resolve('book.xlsx', 2);
    expect(checker.level).toBe(2);
    expect(LEVEL2_CAPABILITIES.every((name) => checker.lookup(name) !== undefined)).toBe(true);
    expect(checker.lookup('checkCodebookExists')).toBeUndefined();
  });

  it('rejects unknown extensions and levels', () => {
    expect(() => factory.resolve('book.ods', 1)).toThrow(AuditConfigurationError);
    expect(() => factory.resolve('book.ods', 1)).toThrow(
      'No checker for "book.ods"; supported extensions are .csv, .xls, .xlsx',
    );
    expect(() => factory.resolve('book.csv', 4)).toThrow('Unknown rule level 4; expected one of 1, 2, 3');
  });

  it('reports which files it supports', () => {
    expect(factory.supports('a.xlsx')).toBe(true);
    expect(factory.supports('a.json')).toBe(false);
  });
});
