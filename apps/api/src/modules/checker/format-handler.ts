import type { CellRange, FileFormat, TableContext } from '@tabaudit/shared';
import type { DrawingPart, WorkbookHandle } from '../workbook/workbook-types';

/**
 * How well a format can answer a leaf question.
 * - unsupported: the concept does not exist in the format
 * - degraded: answered from partial information, with a caveat
 * - full: answered completely
 */
export type Support<T> =
  | { fidelity: 'unsupported'; reason: string }
  | { fidelity: 'degraded'; value: T; caveat: string }
  | { fidelity: 'full'; value: T };

export const unsupported = <T>(reason: string): Support<T> => ({ fidelity: 'unsupported', reason });
export const degraded = <T>(value: T, caveat: string): Support<T> => ({ fidelity: 'degraded', value, caveat });
export const full = <T>(value: T): Support<T> => ({ fidelity: 'full', value });

/** 0-based grid indices */
export interface HiddenLines {
  rows: readonly number[];
  columns: readonly number[];
}

export interface StyleFinding {
  ref: string;
  traits: readonly string[];
}

export interface RowSpan {
  start: number;
  end: number;
}

/** Format-specific leaf operations used by the level checkers */
export interface FormatHandler {
  readonly format: FileFormat;
  readonly label: string;
  readonly extensions: readonly string[];
  /** Whether one file can carry companion sheets next to the data */
  readonly multiSheet: boolean;
  /** Attached to a passing format check when the format is only partly inspectable */
  readonly formatCaveat?: string;

  listDrawings(workbook: WorkbookHandle): Support<readonly DrawingPart[]>;
  listHiddenLines(workbook: WorkbookHandle, sheetName: string): Support<HiddenLines>;
  listMergedRanges(workbook: WorkbookHandle, sheetName: string): Support<readonly CellRange[]>;
  listStyledCells(workbook: WorkbookHandle, sheetName: string, rows: RowSpan): Support<readonly StyleFinding[]>;
  /** Problems only this format can have, as human-readable lines */
  inspectNativeStructure(workbook: WorkbookHandle, ctx: TableContext): Support<readonly string[]>;
}

type HandleOf<F extends FileFormat> = Extract<WorkbookHandle, { format: F }>;

function isFormat<F extends FileFormat>(workbook: WorkbookHandle, format: F): workbook is HandleOf<F> {
  return workbook.format === format;
}

export function expectFormat<F extends FileFormat>(workbook: WorkbookHandle, format: F): HandleOf<F> {
  if (!isFormat(workbook, format)) {
    throw new Error(`Expected a ${format} workbook, got ${workbook.format}`);
  }
  return workbook;
}

/** Last six hex digits of an RGB/ARGB colour, upper-cased */
export function rgbOf(color: string): string {
  return color.slice(-6).toUpperCase();
}

/** White and black count as "no colour" for fills, black for fonts */
export const DEFAULT_FILL_RGB: ReadonlySet<string> = new Set(['FFFFFF', '000000']);
export const DEFAULT_FONT_RGB: ReadonlySet<string> = new Set(['000000']);

/** First header row to last data row; header-only tables end at the header */
export function tableRowSpan(ctx: TableContext): RowSpan {
  const { headerRows, dataStart, dataEnd } = ctx.rowIndices;
  const start = headerRows.length > 0 ? Math.min(...headerRows) : dataStart;
  const end = Math.max(dataEnd, ...headerRows);
  return { start, end };
}
