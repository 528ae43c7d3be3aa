import { Injectable } from '@nestjs/common';
import { isBlankRow, type CellRange, type TableContext } from '@tabaudit/shared';
import type { DrawingPart, WorkbookHandle } from '../../workbook/workbook-types';
import {
  expectFormat,
  full,
  tableRowSpan,
  unsupported,
  type FormatHandler,
  type HiddenLines,
  type StyleFinding,
  type Support,
} from '../format-handler';

const PLAIN_TEXT = 'plain-text CSV has no such feature';

@Injectable()
export class CsvFormatHandler implements FormatHandler {
  readonly format = 'csv';
  readonly label = 'CSV';
  readonly extensions = ['.csv'];
  readonly multiSheet = false;

  listDrawings(_workbook: WorkbookHandle): Support<readonly DrawingPart[]> {
    return unsupported(PLAIN_TEXT);
  }

  listHiddenLines(_workbook: WorkbookHandle, _sheetName: string): Support<HiddenLines> {
    return unsupported(PLAIN_TEXT);
  }

  listMergedRanges(_workbook: WorkbookHandle, _sheetName: string): Support<readonly CellRange[]> {
    return unsupported(PLAIN_TEXT);
  }

  listStyledCells(): Support<readonly StyleFinding[]> {
    return unsupported(PLAIN_TEXT);
  }

  /** Records whose field count differs from the header record */
  inspectNativeStructure(workbook: WorkbookHandle, ctx: TableContext): Support<readonly string[]> {
    const csv = expectFormat(workbook, 'csv');
    const grid = csv.sheets[0]?.grid ?? [];
    const { start, end } = tableRowSpan(ctx);
    const expected = csv.recordWidths[start];
    if (expected === undefined) return full([]);

    const issues: string[] = [];
    for (let r = start; r <= end; r++) {
      const width = csv.recordWidths[r];
      if (width === undefined || isBlankRow(grid[r])) continue;
      if (width !== expected) {
        issues.push(`Row ${r + 1} has ${width} fields, expected ${expected}`);
      }
    }
    return full(issues);
  }
}
