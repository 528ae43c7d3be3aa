import type { CellRange, CellValue } from '../types';

/**
 * Convert column index (0-based) to Excel letter(s): 0→A, 25→Z, 26→AA
 */
export function colIndexToLetter(index: number): string {
  let result = '';
  let n = index;
  while (n >= 0) {
    result = String.fromCharCode((n % 26) + 65) + result;
    n = Math.floor(n / 26) - 1;
  }
  return result;
}

/**
 * Convert Excel column letter(s) to 0-based index: A→0, Z→25, AA→26
 */
export function letterToColIndex(letter: string): number {
  let result = 0;
  for (let i = 0; i < letter.length; i++) {
    result = result * 26 + (letter.charCodeAt(i) - 64);
  }
  return result - 1;
}

/**
 * Parse cell reference like "A1" (or "$A$1") into { col: 0, row: 0 }
 */
export function parseCellRef(ref: string): { col: number; row: number } {
  const match = ref.match(/^\$?([A-Z]{1,3})\$?(\d{1,7})$/);
  if (!match) {
    throw new Error(`Invalid cell reference: ${ref}`);
  }
  const [, letters = '', digits = ''] = match;
  return {
    col: letterToColIndex(letters),
    row: parseInt(digits, 10) - 1,
  };
}

/**
 * Build cell reference from col/row indices: (0, 0) → "A1"
 */
export function buildCellRef(col: number, row: number): string {
  return `${colIndexToLetter(col)}${row + 1}`;
}

/**
 * Parse a range like "A1:C3" into an inclusive 0-based range. A single cell ref is a 1x1 range.
 */
export function parseRangeRef(ref: string): CellRange | null {
  const [from, to = from] = ref.split(':');
  if (!from) return null;
  try {
    const start = parseCellRef(from);
    const end = parseCellRef(to);
    return {
      startRow: Math.min(start.row, end.row),
      startCol: Math.min(start.col, end.col),
      endRow: Math.max(start.row, end.row),
      endCol: Math.max(start.col, end.col),
    };
  } catch {
    return null;
  }
}

export function buildRangeRef(range: CellRange): string {
  return `${buildCellRef(range.startCol, range.startRow)}:${buildCellRef(range.endCol, range.endRow)}`;
}

/** Empty, or a string of whitespace only */
export function isBlank(value: CellValue): boolean {
  return value === null || (typeof value === 'string' && value.trim() === '');
}

export function cellToText(value: CellValue): string {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  return String(value);
}

/**
 * Check if a string looks like a slash-separated date: 2024/01/15, 1/15/2024
 */
export function isSlashDate(value: string): boolean {
  return /^\d{1,4}\/\d{1,2}\/\d{1,4}$/.test(value.trim());
}
