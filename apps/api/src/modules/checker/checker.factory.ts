import { Inject, Injectable, Logger } from '@nestjs/common';
import path from 'node:path';
import { RULE_LEVELS, type RuleLevel } from '@tabaudit/shared';
import { AuditConfigurationError } from '../../common/errors/audit-errors';
import { JUDGMENT_ORACLE, type JudgmentOracle } from '../ai/judgment-oracle';
import { CheckerShell, type Capability, type CheckEnvironment } from './checker-shell';
import type { FormatHandler } from './format-handler';
import { CsvFormatHandler } from './handlers/csv-format.handler';
import { XlsFormatHandler } from './handlers/xls-format.handler';
import { XlsxFormatHandler } from './handlers/xlsx-format.handler';
import { level1Capabilities } from './level1.checker';
import { level2Capabilities } from './level2.checker';
import { level3Capabilities } from './level3.checker';

const CAPABILITY_SETS: Record<
  RuleLevel,
  (handler: FormatHandler, env: CheckEnvironment) => Readonly<Record<string, Capability>>
> = {
  1: level1Capabilities,
  2: level2Capabilities,
  3: level3Capabilities,
};

function isRuleLevel(level: number): level is RuleLevel {
  return RULE_LEVELS.some((l) => l === level);
}

/**
 * Resolves a (file, level) pair to the checker for that file's format.
 */
@Injectable()
export class CheckerFactory {
  private readonly handlers: readonly FormatHandler[];
  private readonly env: CheckEnvironment;

  constructor(
    @Inject(JUDGMENT_ORACLE) oracle: JudgmentOracle,
    csv: CsvFormatHandler,
    xls: XlsFormatHandler,
    xlsx: XlsxFormatHandler,
  ) {
    this.handlers = [csv, xls, xlsx];
    this.env = { oracle, logger: new Logger('Checks') };
  }

  supports(filePath: string): boolean {
    return this.handlerFor(filePath) !== undefined;
  }

  resolve(filePath: string, level: number): CheckerShell {
    if (!isRuleLevel(level)) {
      throw new AuditConfigurationError(`Unknown rule level ${level}; expected one of ${RULE_LEVELS.join(', ')}`);
    }
    const handler = this.handlerFor(filePath);
    if (!handler) {
      const known = this.handlers.flatMap((h) => h.extensions).join(', ');
      throw new AuditConfigurationError(
        `No checker for "${path.basename(filePath)}"; supported extensions are ${known}`,
      );
    }
    return new CheckerShell(level, handler, CAPABILITY_SETS[level](handler, this.env));
  }

  private handlerFor(filePath: string): FormatHandler | undefined {
    const ext = path.extname(filePath).toLowerCase();
    return this.handlers.find((h) => h.extensions.includes(ext));
  }
}
