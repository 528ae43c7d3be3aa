import type { CellValue } from '@tabaudit/shared';

export type CsvEncoding = 'utf-8' | 'shift_jis';

function tryDecode(buffer: Buffer, encoding: CsvEncoding): string | null {
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(buffer);
  } catch {
    return null;
  }
}

/** UTF-8 (BOM stripped) first, then Shift_JIS as written by Japanese Excel */
export function decodeCsv(buffer: Buffer): { text: string; encoding: CsvEncoding } | null {
  const utf8 = tryDecode(buffer, 'utf-8');
  if (utf8 !== null) return { text: utf8, encoding: 'utf-8' };
  const sjis = tryDecode(buffer, 'shift_jis');
  if (sjis !== null) return { text: sjis, encoding: 'shift_jis' };
  return null;
}

export function detectDelimiter(text: string): string {
  const sampleLines = text.split(/\r\n|\r|\n/).slice(0, 5).join('\n');
  const candidates = [',', ';', '\t', '|'] as const;
  let best = ',';
  let bestCount = 0;
  for (const d of candidates) {
    const count = sampleLines.split(d).length - 1;
    if (count > bestCount) {
      bestCount = count;
      best = d;
    }
  }
  return best;
}

/**
 * Parse CSV text handling quoted fields, delimiters inside quotes, and newlines inside quotes.
 * Field text is kept verbatim and blank lines stay as single-field records.
 */
export function parseCsvContent(text: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let current = '';
  let inQuotes = false;
  let row: string[] = [];

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (inQuotes) {
      if (ch === '"') {
        if (text.charAt(i + 1) === '"') {
          current += '"';
          i++; // skip escaped quote
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      row.push(current);
      current = '';
    } else if (ch === '\n' || ch === '\r') {
      row.push(current);
      rows.push(row);
      current = '';
      row = [];
      if (ch === '\r' && text.charAt(i + 1) === '\n') i++; // \r\n is one break
    } else {
      current += ch;
    }
  }
  // Last record, unless the text ended with a newline
  if (current !== '' || row.length > 0) {
    row.push(current);
    rows.push(row);
  }
  return rows;
}

/** Infer a typed value from a CSV field. Codes with leading zeros stay strings. */
export function inferCsvValue(raw: string): CellValue {
  if (raw === '') return null;

  const lower = raw.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;

  if (/^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/.test(raw) && !/^[+-]?0\d/.test(raw)) {
    const num = Number(raw);
    if (Number.isFinite(num)) return num;
  }
  return raw;
}
