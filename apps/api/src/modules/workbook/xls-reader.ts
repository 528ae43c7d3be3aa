import * as XLSX from 'xlsx';
import { normalizeGrid, type CellValue, type RawSheet } from '@tabaudit/shared';

function isCellObject(value: unknown): value is XLSX.CellObject {
  return typeof value === 'object' && value !== null && 't' in value;
}

export function xlsCell(ws: XLSX.WorkSheet, row: number, col: number): XLSX.CellObject | undefined {
  const cell: unknown = ws[XLSX.utils.encode_cell({ r: row, c: col })];
  return isCellObject(cell) ? cell : undefined;
}

/** Row and column bounds of the used area (0-based, inclusive), or null for an empty sheet */
export function xlsBounds(ws: XLSX.WorkSheet): XLSX.Range | null {
  const ref = ws['!ref'];
  return typeof ref === 'string' ? XLSX.utils.decode_range(ref) : null;
}

export function xlsValue(cell: XLSX.CellObject): CellValue {
  const { v } = cell;
  switch (cell.t) {
    case 'z':
      return null;
    case 'e':
      return cell.w ?? '#ERROR';
    case 'd':
      return v instanceof Date ? v.toISOString() : null;
    default:
      if (v instanceof Date) return v.toISOString();
      return v === undefined ? null : v;
  }
}

export function readXlsSheet(name: string, ws: XLSX.WorkSheet | undefined): RawSheet {
  const bounds = ws ? xlsBounds(ws) : null;
  if (!ws || !bounds) return { name, grid: [] };

  const rows: CellValue[][] = [];
  for (let r = 0; r <= bounds.e.r; r++) {
    const values: CellValue[] = [];
    for (let c = 0; c <= bounds.e.c; c++) {
      const cell = xlsCell(ws, r, c);
      values.push(cell ? xlsValue(cell) : null);
    }
    rows.push(values);
  }
  return { name, grid: normalizeGrid(rows) };
}

export function readXlsBook(buffer: Buffer): XLSX.WorkBook {
  return XLSX.read(buffer, { type: 'buffer', cellStyles: true, cellFormula: true, cellDates: true });
}
