import type { LoggerService } from '@nestjs/common';
import type { CheckVerdict, RuleLevel, TableContext } from '@tabaudit/shared';
import type { WorkbookHandle } from '../workbook/workbook-types';
import type { JudgmentOracle } from '../ai/judgment-oracle';
import type { FormatHandler } from './format-handler';

/** One rule implementation. Pure apart from the injected oracle. */
export type Capability = (
  ctx: TableContext,
  workbook: WorkbookHandle,
  filePath: string,
) => CheckVerdict | Promise<CheckVerdict>;

/** Collaborators handed to every capability set */
export interface CheckEnvironment {
  oracle: JudgmentOracle;
  logger: LoggerService;
}

/**
 * Level checker resolved for one format: a fixed capability table over a format handler.
 */
export class CheckerShell {
  private readonly table: ReadonlyMap<string, Capability>;

  constructor(
    readonly level: RuleLevel,
    readonly handler: FormatHandler,
    capabilities: Readonly<Record<string, Capability>>,
  ) {
    this.table = new Map(Object.entries(capabilities));
  }

  get format(): string {
    return this.handler.format;
  }

  lookup(name: string): Capability | undefined {
    return this.table.get(name);
  }
}
