import { Injectable } from '@nestjs/common';
import ExcelJS from 'exceljs';
import {
  CHECK_LIMITS,
  buildCellRef,
  parseRangeRef,
  type CellRange,
  type TableContext,
} from '@tabaudit/shared';
import type { DrawingPart, WorkbookHandle, XlsxWorkbook } from '../../workbook/workbook-types';
import {
  DEFAULT_FILL_RGB,
  DEFAULT_FONT_RGB,
  expectFormat,
  full,
  rgbOf,
  tableRowSpan,
  type FormatHandler,
  type HiddenLines,
  type RowSpan,
  type StyleFinding,
  type Support,
} from '../format-handler';

function fillTrait(fill: ExcelJS.Fill | undefined): string | null {
  if (!fill) return null;
  if (fill.type !== 'pattern') return 'gradient fill';
  if (fill.pattern === 'none') return null;
  const { fgColor } = fill;
  if (fgColor?.argb) {
    return DEFAULT_FILL_RGB.has(rgbOf(fgColor.argb)) ? null : `fill ${rgbOf(fgColor.argb)}`;
  }
  return fgColor?.theme !== undefined ? `fill theme ${fgColor.theme}` : null;
}

function fontTraits(font: Partial<ExcelJS.Font> | undefined): string[] {
  if (!font) return [];
  const traits: string[] = [];
  if (font.bold) traits.push('bold');
  if (font.italic) traits.push('italic');
  if (font.underline && font.underline !== 'none') traits.push('underline');
  if (font.size !== undefined && (font.size < CHECK_LIMITS.FONT_SIZE_MIN || font.size > CHECK_LIMITS.FONT_SIZE_MAX)) {
    traits.push(`size ${font.size}`);
  }
  if (font.color?.argb && !DEFAULT_FONT_RGB.has(rgbOf(font.color.argb))) {
    traits.push(`font ${rgbOf(font.color.argb)}`);
  }
  return traits;
}

/** Error text for error values and formulas that evaluated to an error */
function errorOf(value: ExcelJS.CellValue): string | null {
  if (typeof value !== 'object' || value === null || value instanceof Date) return null;
  if ('error' in value) return value.error;
  if ('formula' in value || 'sharedFormula' in value) {
    const { result } = value;
    if (typeof result === 'object' && !(result instanceof Date)) return result.error;
  }
  return null;
}

function isUncachedFormula(value: ExcelJS.CellValue): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    ('formula' in value || 'sharedFormula' in value) &&
    value.result === undefined
  );
}

@Injectable()
export class XlsxFormatHandler implements FormatHandler {
  readonly format = 'xlsx';
  readonly label = 'Excel workbook (.xlsx)';
  readonly extensions = ['.xlsx'];
  readonly multiSheet = true;

  private worksheet(workbook: WorkbookHandle, sheetName: string): { book: XlsxWorkbook; ws: ExcelJS.Worksheet } {
    const book = expectFormat(workbook, 'xlsx');
    const ws = book.book.getWorksheet(sheetName);
    if (!ws) throw new Error(`Worksheet "${sheetName}" not found`);
    return { book, ws };
  }

  listDrawings(workbook: WorkbookHandle): Support<readonly DrawingPart[]> {
    return full(expectFormat(workbook, 'xlsx').drawings.filter((d) => d.anchors > 0));
  }

  listHiddenLines(workbook: WorkbookHandle, sheetName: string): Support<HiddenLines> {
    const { ws } = this.worksheet(workbook, sheetName);
    const rows: number[] = [];
    for (let r = 1; r <= ws.rowCount; r++) {
      if (ws.getRow(r).hidden) rows.push(r - 1);
    }
    const columns: number[] = [];
    for (let c = 1; c <= ws.columnCount; c++) {
      if (ws.getColumn(c).hidden) columns.push(c - 1);
    }
    return full({ rows, columns });
  }

  listMergedRanges(workbook: WorkbookHandle, sheetName: string): Support<readonly CellRange[]> {
    const { ws } = this.worksheet(workbook, sheetName);
    const ranges: CellRange[] = [];
    for (const ref of ws.model.merges ?? []) {
      const range = parseRangeRef(ref);
      if (range) ranges.push(range);
    }
    return full(ranges);
  }

  listStyledCells(workbook: WorkbookHandle, sheetName: string, rows: RowSpan): Support<readonly StyleFinding[]> {
    const { ws } = this.worksheet(workbook, sheetName);
    const findings: StyleFinding[] = [];
    for (let r = rows.start; r <= rows.end; r++) {
      ws.getRow(r + 1).eachCell({ includeEmpty: true }, (cell, colNumber) => {
        const fill = fillTrait(cell.fill);
        const traits = [...(fill ? [fill] : []), ...fontTraits(cell.font)];
        if (traits.length > 0) {
          findings.push({ ref: buildCellRef(colNumber - 1, r), traits });
        }
      });
    }
    return full(findings);
  }

  /** Error values and formulas saved without a cached result */
  inspectNativeStructure(workbook: WorkbookHandle, ctx: TableContext): Support<readonly string[]> {
    const { ws } = this.worksheet(workbook, ctx.sheetName);
    const { start, end } = tableRowSpan(ctx);
    const issues: string[] = [];
    for (let r = start; r <= end; r++) {
      ws.getRow(r + 1).eachCell((cell, colNumber) => {
        const ref = buildCellRef(colNumber - 1, r);
        const error = errorOf(cell.value);
        if (error) {
          issues.push(`${ref} holds the error value ${error}`);
        } else if (isUncachedFormula(cell.value)) {
          issues.push(`${ref} holds a formula without a stored value`);
        }
      });
    }
    return full(issues);
  }
}
