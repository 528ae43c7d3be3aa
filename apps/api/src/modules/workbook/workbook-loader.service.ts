import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { FILE_LIMITS, normalizeGrid } from '@tabaudit/shared';
import { AuditConfigurationError, AuditResourceError, errorMessage } from '../../common/errors/audit-errors';
import type { CsvWorkbook, DrawingPart, WorkbookHandle, XlsWorkbook, XlsxWorkbook } from './workbook-types';
import { decodeCsv, detectDelimiter, inferCsvValue, parseCsvContent } from './csv-reader';
import { readWorksheet, scanDrawings } from './xlsx-reader';
import { readXlsBook, readXlsSheet } from './xls-reader';

@Injectable()
export class WorkbookLoaderService {
  private readonly logger = new Logger(WorkbookLoaderService.name);

  async load(filePath: string): Promise<WorkbookHandle> {
    const ext = path.extname(filePath).toLowerCase();
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (err) {
      throw new AuditResourceError(`Cannot read ${path.basename(filePath)}: ${errorMessage(err)}`, err);
    }
    return this.parseBuffer(buffer, ext);
  }

  async parseBuffer(buffer: Buffer, ext: string): Promise<WorkbookHandle> {
    switch (ext) {
      case '.csv':
        return this.parseCsv(buffer);
      case '.xls':
        return this.parseXls(buffer);
      case '.xlsx':
        return this.parseXlsx(buffer);
      default:
        throw new AuditConfigurationError(`Unsupported file type "${ext || '(none)'}"`);
    }
  }

  private parseCsv(buffer: Buffer): CsvWorkbook {
    const decoded = decodeCsv(buffer);
    if (!decoded) {
      throw new AuditResourceError('CSV file is neither UTF-8 nor Shift_JIS text');
    }
    const delimiter = detectDelimiter(decoded.text);
    const records = parseCsvContent(decoded.text, delimiter);
    const grid = normalizeGrid(records.map((record) => record.map(inferCsvValue)));
    this.logger.log(
      `Parsed CSV: ${records.length} records (${decoded.encoding}, delimiter ${JSON.stringify(delimiter)})`,
    );
    return {
      format: 'csv',
      sheets: [{ name: FILE_LIMITS.CSV_SHEET_NAME, grid }],
      encoding: decoded.encoding,
      delimiter,
      recordWidths: records.map((record) => record.length),
    };
  }

  private parseXls(buffer: Buffer): XlsWorkbook {
    try {
      const book = readXlsBook(buffer);
      const sheets = book.SheetNames.map((name) => readXlsSheet(name, book.Sheets[name]));
      this.logger.log(`Parsed XLS: ${sheets.length} sheets`);
      return { format: 'xls', sheets, book };
    } catch (err) {
      throw new AuditResourceError(`Cannot parse XLS workbook: ${errorMessage(err)}`, err);
    }
  }

  private async parseXlsx(buffer: Buffer): Promise<XlsxWorkbook> {
    const book = new ExcelJS.Workbook();
    let drawings: DrawingPart[];
    try {
      await book.xlsx.load(buffer as unknown as ExcelJS.Buffer);
      drawings = await scanDrawings(buffer);
    } catch (err) {
      throw new AuditResourceError(`Cannot parse XLSX workbook: ${errorMessage(err)}`, err);
    }
    const sheets = book.worksheets.map(readWorksheet);
    this.logger.log(`Parsed XLSX: ${sheets.length} sheets, ${drawings.length} drawing parts`);
    return { format: 'xlsx', sheets, book, drawings };
  }
}
