import ExcelJS from 'exceljs';
import JSZip from 'jszip';
import { normalizeGrid, type CellValue, type RawSheet } from '@tabaudit/shared';
import type { DrawingPart } from './workbook-types';

export function extractExcelValue(raw: ExcelJS.CellValue): CellValue {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'number' || typeof raw === 'boolean' || typeof raw === 'string') return raw;
  if (raw instanceof Date) return raw.toISOString();
  if ('richText' in raw) return raw.richText.map((r) => r.text).join('');
  if ('formula' in raw || 'sharedFormula' in raw) {
    return raw.result === undefined ? null : extractExcelValue(raw.result);
  }
  if ('error' in raw) return raw.error;
  if ('hyperlink' in raw) return raw.text;
  return null;
}

/** Cell values of a worksheet; merged follower cells read as empty */
export function readWorksheet(ws: ExcelJS.Worksheet): RawSheet {
  const rows: CellValue[][] = [];
  for (let r = 1; r <= ws.rowCount; r++) {
    const row = ws.getRow(r);
    const values: CellValue[] = [];
    for (let c = 1; c <= ws.columnCount; c++) {
      const cell = row.getCell(c);
      values.push(cell.type === ExcelJS.ValueType.Merge ? null : extractExcelValue(cell.value));
    }
    rows.push(values);
  }
  return { name: ws.name, grid: normalizeGrid(rows) };
}

const DRAWING_PART = /^xl\/drawings\/[^/]+\.xml$/;
const EMBEDDING_PART = /^xl\/embeddings\/[^/]+$/;
const ANCHOR = /<xdr:(?:twoCellAnchor|oneCellAnchor|absoluteAnchor)\b/g;

/** Drawing parts with their anchors, plus embedded OLE objects, from the package */
export async function scanDrawings(buffer: Buffer): Promise<DrawingPart[]> {
  const zip = await JSZip.loadAsync(buffer);
  const parts: DrawingPart[] = [];
  for (const name of Object.keys(zip.files).sort()) {
    if (DRAWING_PART.test(name)) {
      const xml = (await zip.file(name)?.async('string')) ?? '';
      parts.push({ path: name, anchors: xml.match(ANCHOR)?.length ?? 0 });
    } else if (EMBEDDING_PART.test(name)) {
      parts.push({ path: name, anchors: 1 });
    }
  }
  return parts;
}
