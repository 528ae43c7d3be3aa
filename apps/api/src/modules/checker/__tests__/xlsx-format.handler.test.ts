import { describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import { WorkbookLoaderService } from '../../workbook/workbook-loader.service';
import type { XlsxWorkbook } from '../../workbook/workbook-types';
import { XlsxFormatHandler } from '../handlers/xlsx-format.handler';
import { level1Capabilities } from '../level1.checker';
import { contextOf, makeEnv } from './check-fixtures';

const handler = new XlsxFormatHandler();
const checks = level1Capabilities(handler, makeEnv());
const loader = new WorkbookLoaderService();

// 1x1 transparent PNG
const PIXEL = 'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==';

async function loadXlsx(build: (ws: ExcelJS.Worksheet, book: ExcelJS.Workbook) => void): Promise<XlsxWorkbook> {
  const book = new ExcelJS.Workbook();
  const ws = book.addWorksheet('Data');
  ws.addRow(['id', 'name', 'score']);
  ws.addRow([1, 'Ann', 10]);
  ws.addRow([2, 'Bob', 20]);
  build(ws, book);
  const handle = await loader.parseBuffer(Buffer.from(await book.xlsx.writeBuffer()), '.xlsx');
  if (handle.format !== 'xlsx') throw new Error('expected an xlsx workbook');
  return handle;
}

function dataContext(workbook: XlsxWorkbook) {
  const sheet = workbook.sheets[0];
  if (!sheet) throw new Error('missing sheet');
  return contextOf(sheet.grid.map((row) => [...row]), { dataEnd: 2 }, sheet.name);
}

describe('XlsxFormatHandler', () => {
  it('passes a plain workbook on every inspecting check', async () => {
    const workbook = await loadXlsx(() => undefined);
    const ctx = dataContext(workbook);
    expect(await checks.checkNoImagesOrObjects(ctx, workbook, 'a.xlsx')).toEqual({
      passed: true,
      message: 'No images or embedded objects found',
    });
    expect(await checks.checkNoHiddenRowsOrColumns(ctx, workbook, 'a.xlsx')).toEqual({
      passed: true,
      message: 'No hidden rows or columns',
    });
    expect(await checks.checkNoMergedCells(ctx, workbook, 'a.xlsx')).toEqual({
      passed: true,
      message: 'No merged cells in the table',
    });
    expect((await checks.checkValidFileFormat(ctx, workbook, 'a.xlsx')).passed).toBe(true);
  });

  it('finds pictures through the drawing parts', async () => {
    const workbook = await loadXlsx((ws, book) => {
      const imageId = book.addImage({ base64: PIXEL, extension: 'png' });
      ws.addImage(imageId, { tl: { col: 4, row: 0 }, ext: { width: 10, height: 10 } });
    });
    const verdict = await checks.checkNoImagesOrObjects(dataContext(workbook), workbook, 'a.xlsx');
    expect(verdict).toEqual({ passed: false, message: 'Found 1 image(s) or object(s) in xl/drawings/drawing1.xml' });
  });

  it('reports hidden rows and columns', async () => {
    const workbook = await loadXlsx((ws) => {
      ws.getRow(3).hidden = true;
      ws.getColumn(3).hidden = true;
    });
    const verdict = await checks.checkNoHiddenRowsOrColumns(dataContext(workbook), workbook, 'a.xlsx');
    expect(verdict).toEqual({ passed: false, message: 'Found hidden rows 3; hidden columns C' });
  });

  it('reports merges inside the table only', async () => {
    const workbook = await loadXlsx((ws) => {
      ws.mergeCells('A1:B1');
      ws.getCell('A6').value = 'note';
      ws.mergeCells('A6:B6');
    });
    const verdict = await checks.checkNoMergedCells(dataContext(workbook), workbook, 'a.xlsx');
    expect(verdict).toEqual({ passed: false, message: 'Merged cells in the table: A1:B1' });
  });

  it('lists data cells whose fill or font may carry meaning', async () => {
    const workbook = await loadXlsx((ws) => {
      ws.getCell('B2').font = { bold: true };
      ws.getCell('C3').fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFF0000' } };
    });
    const support = handler.listStyledCells(workbook, 'Data', { start: 1, end: 2 });
    expect(support.fidelity).toBe('full');
    const findings = support.fidelity === 'full' ? support.value : [];
    expect(findings.map((f) => f.ref)).toEqual(['B2', 'C3']);
    expect(findings[0]?.traits).toContain('bold');
    expect(findings[1]?.traits).toContain('fill FF0000');
  });

  it('reports error values and formulas without a stored result', async () => {
    const workbook = await loadXlsx((ws) => {
      ws.getCell('B3').value = { error: '#N/A' };
      ws.getCell('C3').value = { formula: 'A2*2', date1904: false };
    });
    const support = handler.inspectNativeStructure(workbook, dataContext(workbook));
    expect(support).toEqual({
      fidelity: 'full',
      value: ['B3 holds the error value #N/A', 'C3 holds a formula without a stored value'],
    });
  });

  it('rejects a handle of another format', () => {
    const csvHandle = {
      format: 'csv' as const,
      sheets: [],
      encoding: 'utf-8' as const,
      delimiter: ',',
      recordWidths: [],
    };
    expect(() => handler.listMergedRanges(csvHandle, 'Data')).toThrow('Expected a xlsx workbook, got csv');
  });
});
