import { describe, it, expect } from 'vitest';
import { access, readFile } from 'node:fs/promises';
import path from 'node:path';
import { TempFileService } from '../services/temp-file.service';

const exists = (p: string) =>
  access(p).then(
    () => true,
    () => false,
  );

describe('TempFileService', () => {
  const service = new TempFileService();

  it('hands the callback a copy that is removed afterwards', async () => {
    let seen = '';
    const content = await service.withTempCopy(Buffer.from('a,b\n'), 'table.csv', async (filePath) => {
      seen = filePath;
      return readFile(filePath, 'utf-8');
    });
    expect(content).toBe('a,b\n');
    expect(path.basename(seen)).toBe('table.csv');
    expect(await exists(path.dirname(seen))).toBe(false);
  });

  it('removes the copy when the callback throws', async () => {
    let seen = '';
    await expect(
      service.withTempCopy(Buffer.from('x'), 'table.csv', async (filePath) => {
        seen = filePath;
        throw new Error('audit failed');
      }),
    ).rejects.toThrow('audit failed');
    expect(await exists(seen)).toBe(false);
  });

  it('sanitizes uploaded names but keeps the extension', () => {
    expect(service.safeFileName('../../etc/passwd.CSV')).toBe('passwd.csv');
    expect(service.safeFileName('C:\\Users\\me\\売上 2024.xlsx')).toBe('売上_2024.xlsx');
    expect(service.safeFileName('report.final.XLSX')).toBe('report.final.xlsx');
  });
});
