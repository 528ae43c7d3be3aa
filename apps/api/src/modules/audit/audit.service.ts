import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createId } from '@paralleldrive/cuid2';
import path from 'node:path';
import {
  FILE_LIMITS,
  RULE_LEVELS,
  flattenOutcomes,
  isBlankRow,
  summarizeLevel,
  type AuditHints,
  type AuditReport,
  type LevelResult,
  type RawSheet,
} from '@tabaudit/shared';
import { AuditConfigurationError } from '../../common/errors/audit-errors';
import { TempFileService } from '../../common/services/temp-file.service';
import { STRUCTURE_ORACLE, type StructureInferenceOracle } from '../ai/structure-oracle.service';
import { CheckerFactory } from '../checker/checker.factory';
import { CheckRouterService } from '../checker/check-router.service';
import { RuleSetService } from '../checker/rule-set.service';
import { TableContextBuilder } from '../structure/table-context.builder';
import { WorkbookLoaderService } from '../workbook/workbook-loader.service';

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    private readonly loader: WorkbookLoaderService,
    private readonly builder: TableContextBuilder,
    private readonly factory: CheckerFactory,
    private readonly router: CheckRouterService,
    private readonly ruleSets: RuleSetService,
    private readonly tempFiles: TempFileService,
    private readonly config: ConfigService,
    @Inject(STRUCTURE_ORACLE) private readonly structureOracle: StructureInferenceOracle,
  ) {}

  async auditUpload(buffer: Buffer, originalName: string, hints: AuditHints = {}): Promise<AuditReport> {
    const ext = path.extname(originalName).toLowerCase();
    if (!this.factory.supports(originalName)) {
      throw new AuditConfigurationError(
        `Unsupported file type "${ext || '(none)'}"; allowed: ${FILE_LIMITS.ALLOWED_EXTENSIONS.join(', ')}`,
      );
    }
    const maxBytes = this.config.get<number>('MAX_UPLOAD_SIZE_MB', 50) * 1024 * 1024;
    if (buffer.length > maxBytes) {
      throw new AuditConfigurationError(`File exceeds the ${maxBytes / (1024 * 1024)} MB upload limit`);
    }

    const report = await this.tempFiles.withTempCopy(buffer, originalName, (filePath) =>
      this.auditFile(filePath, hints),
    );
    return { ...report, fileName: path.basename(originalName) };
  }

  async auditFile(filePath: string, hints: AuditHints = {}): Promise<AuditReport> {
    const checkers = RULE_LEVELS.map((level) => this.factory.resolve(filePath, level));
    const ruleSets = await this.ruleSets.loadAll();

    const workbook = await this.loader.load(filePath);
    const sheet = await this.chooseSheet(workbook.sheets, hints.sheetName);
    const proposal =
      this.builder.proposalFromHints(hints, sheet.grid) ?? (await this.structureOracle.proposeStructure(sheet));
    const ctx = this.builder.build(sheet, proposal);

    const concurrency = this.config.get<number>('CHECK_CONCURRENCY', 1);
    const levels: LevelResult[] = [];
    for (const checker of checkers) {
      const rules = ruleSets.get(checker.level) ?? [];
      const outcomes = await this.router.run(rules, checker, ctx, workbook, filePath, { concurrency });
      levels.push(summarizeLevel(checker.level, outcomes));
    }

    const summary = levels.map((l) => `L${l.level} ${l.passed}/${l.total}`).join(', ');
    this.logger.log(`Audited ${path.basename(filePath)} [${sheet.name}]: ${summary}`);

    return {
      id: createId(),
      fileName: path.basename(filePath),
      format: workbook.format,
      sheetName: sheet.name,
      context: ctx,
      levels,
      outcomes: flattenOutcomes(levels),
    };
  }

  /** Hint first, then the oracle, then the first sheet with content */
  private async chooseSheet(sheets: readonly RawSheet[], hint: string | undefined): Promise<RawSheet> {
    if (hint !== undefined) {
      const named = sheets.find((s) => s.name === hint);
      if (!named) {
        throw new AuditConfigurationError(
          `Sheet "${hint}" not found; available: ${sheets.map((s) => s.name).join(', ')}`,
        );
      }
      return named;
    }

    const nonEmpty = sheets.filter((s) => s.grid.some((row) => !isBlankRow(row)));
    const chosen = await this.structureOracle.selectMainSheet(sheets);
    const selected = sheets.find((s) => s.name === chosen) ?? nonEmpty[0] ?? sheets[0];
    if (!selected) {
      throw new AuditConfigurationError('Workbook contains no sheets');
    }
    return selected;
  }
}
