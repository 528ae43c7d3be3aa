import { Injectable, Logger } from '@nestjs/common';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

/**
 * Scoped temporary copies of uploaded files. The copy and its directory are
 * removed on every exit path of the callback.
 */
@Injectable()
export class TempFileService {
  private readonly logger = new Logger(TempFileService.name);
  private readonly baseDir = tmpdir();

  async withTempCopy<T>(
    buffer: Buffer,
    originalName: string,
    fn: (filePath: string) => Promise<T>,
  ): Promise<T> {
    const dir = await mkdtemp(path.join(this.baseDir, 'tabaudit-'));
    const filePath = path.join(dir, this.safeFileName(originalName));
    try {
      await writeFile(filePath, buffer);
      return await fn(filePath);
    } finally {
      await rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
        this.logger.warn(`Failed to remove temp dir ${dir}: ${String(err)}`);
      });
    }
  }

  /** Keep the extension, drop path segments and odd characters */
  safeFileName(originalName: string): string {
    const base = path.basename(originalName.replace(/\\/g, '/'));
    const ext = path.extname(base).toLowerCase();
    const stem = path
      .basename(base, path.extname(base))
      .replace(/[^\p{L}\p{N}._-]+/gu, '_')
      .slice(0, 100);
    return `${stem || 'upload'}${ext}`;
  }
}
