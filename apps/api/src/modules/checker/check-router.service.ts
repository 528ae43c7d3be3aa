import { Injectable, Logger } from '@nestjs/common';
import {
  toOutcome,
  type CheckOutcome,
  type CheckVerdict,
  type RuleDescriptor,
  type TableContext,
} from '@tabaudit/shared';
import { errorMessage } from '../../common/errors/audit-errors';
import type { WorkbookHandle } from '../workbook/workbook-types';
import type { CheckerShell } from './checker-shell';

export interface RouteOptions {
  /** Checks in flight at once; 1 runs them in rule order */
  concurrency?: number;
}

/**
 * Runs a rule set against a checker. One outcome per rule, in rule order;
 * a failing or missing capability never stops the others.
 */
@Injectable()
export class CheckRouterService {
  private readonly logger = new Logger(CheckRouterService.name);

  async run(
    rules: readonly RuleDescriptor[],
    checker: CheckerShell,
    ctx: TableContext,
    workbook: WorkbookHandle,
    filePath: string,
    options: RouteOptions = {},
  ): Promise<CheckOutcome[]> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const outcomes = new Array<CheckOutcome | undefined>(rules.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < rules.length) {
        const index = next++;
        const rule = rules[index];
        if (rule) outcomes[index] = toOutcome(rule, await this.dispatch(rule, checker, ctx, workbook, filePath));
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, rules.length) }, () => worker()));
    return outcomes.filter((o): o is CheckOutcome => o !== undefined);
  }

  private async dispatch(
    rule: RuleDescriptor,
    checker: CheckerShell,
    ctx: TableContext,
    workbook: WorkbookHandle,
    filePath: string,
  ): Promise<CheckVerdict> {
    const capability = checker.lookup(rule.capability);
    if (!capability) {
      this.logger.warn(`${rule.id}: capability "${rule.capability}" missing for ${checker.format}`);
      return {
        passed: false,
        message: `Capability "${rule.capability}" is not implemented for ${checker.handler.label}`,
      };
    }
    try {
      return await capability(ctx, workbook, filePath);
    } catch (err) {
      this.logger.warn(`${rule.id} (${rule.capability}) raised: ${errorMessage(err)}`);
      return { passed: false, message: `Check raised an error: ${errorMessage(err)}` };
    }
  }
}
