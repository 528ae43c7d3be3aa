import type ExcelJS from 'exceljs';
import type * as XLSX from 'xlsx';
import type { FileFormat, RawSheet } from '@tabaudit/shared';

/** A drawing or embedded-object part found in an xlsx package */
export interface DrawingPart {
  path: string;
  /** Anchored shapes, pictures or charts in the part */
  anchors: number;
}

interface WorkbookBase {
  format: FileFormat;
  sheets: readonly RawSheet[];
}

export interface CsvWorkbook extends WorkbookBase {
  format: 'csv';
  encoding: 'utf-8' | 'shift_jis';
  delimiter: string;
  /** Field count of every record, aligned with grid rows */
  recordWidths: readonly number[];
}

export interface XlsWorkbook extends WorkbookBase {
  format: 'xls';
  book: XLSX.WorkBook;
}

export interface XlsxWorkbook extends WorkbookBase {
  format: 'xlsx';
  book: ExcelJS.Workbook;
  drawings: readonly DrawingPart[];
}

export type WorkbookHandle = CsvWorkbook | XlsWorkbook | XlsxWorkbook;
