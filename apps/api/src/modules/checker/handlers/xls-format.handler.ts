import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';
import { buildCellRef, type CellRange, type TableContext } from '@tabaudit/shared';
import type { DrawingPart, WorkbookHandle } from '../../workbook/workbook-types';
import { xlsCell } from '../../workbook/xls-reader';
import {
  DEFAULT_FILL_RGB,
  degraded,
  expectFormat,
  rgbOf,
  tableRowSpan,
  type FormatHandler,
  type HiddenLines,
  type RowSpan,
  type StyleFinding,
  type Support,
} from '../format-handler';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Pattern fill colour from a SheetJS style object, when it is not white or black */
function fillColor(style: unknown): string | null {
  if (!isRecord(style)) return null;
  const pattern = style['patternType'];
  const fg = style['fgColor'];
  if (typeof pattern !== 'string' || pattern === 'none' || !isRecord(fg)) return null;
  const rgb = fg['rgb'];
  if (typeof rgb !== 'string' || DEFAULT_FILL_RGB.has(rgbOf(rgb))) return null;
  return rgbOf(rgb);
}

/**
 * Legacy BIFF workbooks read through SheetJS. Row/column flags, merges and fills
 * survive parsing; drawings and most font attributes do not.
 */
@Injectable()
export class XlsFormatHandler implements FormatHandler {
  readonly format = 'xls';
  readonly label = 'Excel 97-2003 workbook (.xls)';
  readonly extensions = ['.xls'];
  readonly multiSheet = true;
  readonly formatCaveat = 'legacy format, only partly inspectable; saving as .xlsx or .csv is recommended';

  private worksheet(workbook: WorkbookHandle, sheetName: string): XLSX.WorkSheet {
    const ws: XLSX.WorkSheet | undefined = expectFormat(workbook, 'xls').book.Sheets[sheetName];
    if (!ws) throw new Error(`Worksheet "${sheetName}" not found`);
    return ws;
  }

  listDrawings(workbook: WorkbookHandle): Support<readonly DrawingPart[]> {
    expectFormat(workbook, 'xls');
    return degraded([], 'images and objects in .xls files cannot be detected; check the file visually');
  }

  listHiddenLines(workbook: WorkbookHandle, sheetName: string): Support<HiddenLines> {
    const ws = this.worksheet(workbook, sheetName);
    const rows: number[] = [];
    (ws['!rows'] ?? []).forEach((info, index) => {
      if (info?.hidden) rows.push(index);
    });
    const columns: number[] = [];
    (ws['!cols'] ?? []).forEach((info, index) => {
      if (info?.hidden) columns.push(index);
    });
    return degraded({ rows, columns }, 'based on .xls row and column flags');
  }

  listMergedRanges(workbook: WorkbookHandle, sheetName: string): Support<readonly CellRange[]> {
    const ws = this.worksheet(workbook, sheetName);
    const ranges = (ws['!merges'] ?? []).map((m) => ({
      startRow: m.s.r,
      startCol: m.s.c,
      endRow: m.e.r,
      endCol: m.e.c,
    }));
    return degraded(ranges, 'merge records of .xls files may be incomplete');
  }

  listStyledCells(workbook: WorkbookHandle, sheetName: string, rows: RowSpan): Support<readonly StyleFinding[]> {
    const ws = this.worksheet(workbook, sheetName);
    const bounds = ws['!ref'] ? XLSX.utils.decode_range(ws['!ref']) : null;
    const findings: StyleFinding[] = [];
    if (bounds) {
      for (let r = rows.start; r <= Math.min(rows.end, bounds.e.r); r++) {
        for (let c = 0; c <= bounds.e.c; c++) {
          const color = fillColor(xlsCell(ws, r, c)?.s);
          if (color) findings.push({ ref: buildCellRef(c, r), traits: [`fill ${color}`] });
        }
      }
    }
    return degraded(findings, 'only cell fills are readable in .xls files');
  }

  inspectNativeStructure(workbook: WorkbookHandle, ctx: TableContext): Support<readonly string[]> {
    const ws = this.worksheet(workbook, ctx.sheetName);
    const { start, end } = tableRowSpan(ctx);
    const width = ctx.header.labels.length;
    const issues: string[] = [];
    for (let r = start; r <= end; r++) {
      for (let c = 0; c < width; c++) {
        const cell = xlsCell(ws, r, c);
        if (!cell) continue;
        if (cell.t === 'e') {
          issues.push(`${buildCellRef(c, r)} holds the error value ${cell.w ?? '#ERROR'}`);
        } else if (cell.f && cell.v === undefined) {
          issues.push(`${buildCellRef(c, r)} holds a formula without a stored value`);
        }
      }
    }
    return degraded(issues, 'formula details of .xls files are partly lost');
  }
}
