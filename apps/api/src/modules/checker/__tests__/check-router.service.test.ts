import { describe, it, expect } from 'vitest';
import type { CheckVerdict, RuleDescriptor } from '@tabaudit/shared';
import { CheckerShell, type Capability } from '../checker-shell';
import { CheckRouterService } from '../check-router.service';
import { CsvFormatHandler } from '../handlers/csv-format.handler';
import { contextOf, csvWorkbook } from './check-fixtures';

function rule(id: string, capability: string): RuleDescriptor {
  return { id, description: `rule ${id}`, severity: 'medium', recommendation: '', capability };
}

const delayed = (ms: number, verdict: CheckVerdict): Capability => () =>
  new Promise<CheckVerdict>((resolve) => setTimeout(() => resolve(verdict), ms));

const capabilities: Record<string, Capability> = {
  ok: () => ({ passed: true, message: 'fine' }),
  bad: () => ({ passed: false, message: 'broken' }),
  boom: () => {
    throw new Error('kaput');
  },
  reject: async () => Promise.reject(new Error('oracle down')),
  slow: delayed(30, { passed: true, message: 'slow' }),
  fast: delayed(1, { passed: true, message: 'fast' }),
};

const router = new CheckRouterService();
const checker = new CheckerShell(1, new CsvFormatHandler(), capabilities);
const ctx = contextOf([['a'], [1]]);

describe('CheckRouterService', () => {
  it('returns one outcome per rule with verdicts used verbatim', async () => {
    const workbook = await csvWorkbook('a\n1\n');
    const outcomes = await router.run([rule('R1', 'ok'), rule('R2', 'bad')], checker, ctx, workbook, 'a.csv');
    expect(outcomes).toEqual([
      { id: 'R1', description: 'rule R1', severity: 'medium', passed: true, result: 'pass', message: 'fine' },
      { id: 'R2', description: 'rule R2', severity: 'medium', passed: false, result: 'fail', message: 'broken' },
    ]);
  });

  it('keeps going after an unknown capability', async () => {
    const workbook = await csvWorkbook('a\n1\n');
    const outcomes = await router.run([rule('R1', 'nope'), rule('R2', 'ok')], checker, ctx, workbook, 'a.csv');
    expect(outcomes.map((o) => o.id)).toEqual(['R1', 'R2']);
    expect(outcomes[0]).toMatchObject({
      passed: false,
      message: 'Capability "nope" is not implemented for CSV',
    });
    expect(outcomes[1]?.passed).toBe(true);
  });

  it('isolates thrown errors and rejected promises', async () => {
    const workbook = await csvWorkbook('a\n1\n');
    const outcomes = await router.run(
      [rule('R1', 'boom'), rule('R2', 'reject'), rule('R3', 'ok')],
      checker,
      ctx,
      workbook,
      'a.csv',
    );
    expect(outcomes.map((o) => [o.id, o.passed, o.message])).toEqual([
      ['R1', false, 'Check raised an error: kaput'],
      ['R2', false, 'Check raised an error: oracle down'],
      ['R3', true, 'fine'],
    ]);
  });

  it('keeps rule order when running in parallel', async () => {
    const workbook = await csvWorkbook('a\n1\n');
    const rules = [rule('R1', 'slow'), rule('R2', 'fast'), rule('R3', 'boom'), rule('R4', 'fast')];
    const sequential = await router.run(rules, checker, ctx, workbook, 'a.csv');
    const parallel = await router.run(rules, checker, ctx, workbook, 'a.csv', { concurrency: 3 });
    expect(parallel.map((o) => o.id)).toEqual(['R1', 'R2', 'R3', 'R4']);
    expect(parallel).toEqual(sequential);
  });

  it('returns nothing for an empty rule set', async () => {
    const workbook = await csvWorkbook('a\n1\n');
    expect(await router.run([], checker, ctx, workbook, 'a.csv', { concurrency: 4 })).toEqual([]);
  });
});
