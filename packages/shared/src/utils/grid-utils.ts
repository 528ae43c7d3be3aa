import type { CellValue, GridRow, RawGrid } from '../types';
import { isBlank } from './cell-utils';

export function isBlankRow(row: GridRow | undefined): boolean {
  return row === undefined || row.every(isBlank);
}

/**
 * Pad ragged rows with nulls and trim trailing blank rows and columns.
 */
export function normalizeGrid(rows: readonly (readonly CellValue[])[]): CellValue[][] {
  let rowCount = rows.length;
  while (rowCount > 0 && isBlankRow(rows[rowCount - 1])) rowCount--;

  let width = 0;
  for (let r = 0; r < rowCount; r++) {
    const row = rows[r] ?? [];
    for (let c = row.length - 1; c >= width; c--) {
      if (!isBlank(row[c] ?? null)) {
        width = c + 1;
        break;
      }
    }
  }

  return rows.slice(0, rowCount).map((row) => fitRow(row, width));
}

/** Cut or pad a row to exactly `width` cells */
export function fitRow(row: GridRow, width: number): CellValue[] {
  const out = row.slice(0, width);
  while (out.length < width) out.push(null);
  return out;
}

/** Index of the last non-blank row, or -1 */
export function lastNonBlankRow(grid: RawGrid): number {
  for (let r = grid.length - 1; r >= 0; r--) {
    if (!isBlankRow(grid[r])) return r;
  }
  return -1;
}

/** Index of the last column holding a non-blank cell in any of the rows, or -1 */
export function lastNonBlankColumn(rows: RawGrid): number {
  let last = -1;
  for (const row of rows) {
    for (let c = row.length - 1; c > last; c--) {
      if (!isBlank(row[c] ?? null)) {
        last = c;
        break;
      }
    }
  }
  return last;
}

export function gridWidth(grid: RawGrid): number {
  return grid.reduce((max, row) => Math.max(max, row.length), 0);
}

/** Recursively freeze plain objects and arrays */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}
