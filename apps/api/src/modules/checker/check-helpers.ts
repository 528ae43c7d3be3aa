import {
  CHECK_LIMITS,
  buildCellRef,
  colIndexToLetter,
  type CellValue,
  type CheckVerdict,
  type TableContext,
} from '@tabaudit/shared';
import type { Support } from './format-handler';

export const pass = (message: string): CheckVerdict => ({ passed: true, message });
export const fail = (message: string): CheckVerdict => ({ passed: false, message });

/**
 * Apply a check to a handler answer. Unsupported features pass as not applicable;
 * degraded answers carry their caveat into the message.
 */
export async function evaluateSupport<T>(
  support: Support<T>,
  evaluate: (value: T) => CheckVerdict | Promise<CheckVerdict>,
): Promise<CheckVerdict> {
  switch (support.fidelity) {
    case 'unsupported':
      return pass(`Not checked: ${support.reason} (not applicable)`);
    case 'degraded': {
      const verdict = await evaluate(support.value);
      return { passed: verdict.passed, message: `${verdict.message} (${support.caveat})` };
    }
    case 'full':
      return evaluate(support.value);
  }
}

/** "a, b, c (+4 more)" */
export function listExamples(items: readonly string[], limit: number = CHECK_LIMITS.MAX_EXAMPLES): string {
  const shown = items.slice(0, limit).join(', ');
  return items.length > limit ? `${shown} (+${items.length - limit} more)` : shown;
}

export function quote(value: CellValue): string {
  const text = String(value).replace(/\n/g, '\\n');
  return `"${text.length > 40 ? `${text.slice(0, 40)}…` : text}"`;
}

/** "age (C)" */
export function columnName(ctx: TableContext, col: number): string {
  return `${ctx.header.labels[col] ?? colIndexToLetter(col)} (${colIndexToLetter(col)})`;
}

export interface TableCell {
  ref: string;
  row: number;
  col: number;
  value: CellValue;
}

/** Data cells in row order, with sheet coordinates */
export function dataCells(ctx: TableContext): TableCell[] {
  const cells: TableCell[] = [];
  ctx.data.forEach((row, i) => {
    const gridRow = ctx.rowIndices.dataStart + i;
    row.forEach((value, col) => cells.push({ ref: buildCellRef(col, gridRow), row: gridRow, col, value }));
  });
  return cells;
}

/** Raw header cells followed by data cells */
export function tableCells(ctx: TableContext): TableCell[] {
  const cells: TableCell[] = [];
  ctx.headerRows.forEach((row, i) => {
    const gridRow = ctx.rowIndices.headerRows[i] ?? i;
    row.forEach((value, col) => cells.push({ ref: buildCellRef(col, gridRow), row: gridRow, col, value }));
  });
  return [...cells, ...dataCells(ctx)];
}

/** Data values of one column */
export function dataColumn(ctx: TableContext, col: number): CellValue[] {
  return ctx.data.map((row) => row[col] ?? null);
}
