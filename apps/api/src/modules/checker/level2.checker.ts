import {
  CHECK_LIMITS,
  FREE_TEXT_PATTERN,
  MISSING_VALUE_EXPRESSIONS,
  STRUCTURE_LIMITS,
  buildCellRef,
  isBlank,
  type CellValue,
  type Level2CapabilityName,
} from '@tabaudit/shared';
import type { Capability, CheckEnvironment } from './checker-shell';
import type { FormatHandler } from './format-handler';
import { columnName, dataColumn, fail, listExamples, pass, quote } from './check-helpers';

const BLANK = '(blank)';

/** A number, or text made only of digits, dots and minus signs that parses as one */
export function isCleanNumeric(value: CellValue): boolean {
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value !== 'string') return false;
  const text = value.trim();
  return /^[\d.-]+$/.test(text) && Number.isFinite(Number(text));
}

/** The missing-value spellings a column uses, blank cells included */
export function missingNotations(values: readonly CellValue[]): string[] {
  const found = new Set<string>();
  for (const value of values) {
    if (isBlank(value)) {
      found.add(BLANK);
    } else if (typeof value === 'string' && MISSING_VALUE_EXPRESSIONS.has(value.trim().toLowerCase())) {
      found.add(value.trim());
    }
  }
  return [...found];
}

function clarityPrompt(label: string): string {
  return (
    `A data table has a column headed "${label}". ` +
    'Is this header unclear to someone reading the data without context ' +
    '(meaningless, an unexplained abbreviation, or a typo)?'
  );
}

export function level2Capabilities(
  _handler: FormatHandler,
  env: CheckEnvironment,
): Record<Level2CapabilityName, Capability> {
  return {
    checkNumericColumnsOnly: (ctx) => {
      const findings: string[] = [];
      ctx.header.labels.forEach((_, col) => {
        const cells = dataColumn(ctx, col)
          .map((value, i) => ({ value, row: ctx.rowIndices.dataStart + i }))
          .filter(({ value }) => !isBlank(value));
        if (cells.length === 0) return;
        const clean = cells.filter(({ value }) => isCleanNumeric(value)).length;
        const ratio = clean / cells.length;
        if (ratio < CHECK_LIMITS.NUMERIC_COLUMN_RATIO || ratio >= CHECK_LIMITS.NUMERIC_PURITY_RATIO) return;
        const offenders = cells
          .filter(({ value }) => !isCleanNumeric(value))
          .map(({ value, row }) => `${buildCellRef(col, row)} ${quote(value)}`);
        findings.push(`${columnName(ctx, col)}: ${listExamples(offenders)}`);
      });
      return findings.length > 0
        ? fail(`Numeric columns contain non-numeric values: ${findings.join('; ')}`)
        : pass('Numeric columns contain numbers only');
    },

    checkSeparateOtherDetailColumns: (ctx) => {
      const findings: string[] = [];
      ctx.header.labels.forEach((_, col) => {
        const sample = dataColumn(ctx, col).find(
          (value) => typeof value === 'string' && FREE_TEXT_PATTERN.test(value),
        );
        if (sample !== undefined) findings.push(`${columnName(ctx, col)} ${quote(sample)}`);
      });
      return findings.length > 0
        ? fail(`Free-text details are mixed into choice columns: ${listExamples(findings)}`)
        : pass('Free-text details are kept out of choice columns');
    },

    checkNoMissingColumnHeaders: async (ctx) => {
      const { labels, synthetic } = ctx.header;
      if (synthetic) {
        return fail('Header labels do not line up with the data columns; positional names were used');
      }
      if (labels.length === 0) return pass('No columns to inspect');

      const missing = labels
        .map((label, col) => ({ label, col }))
        .filter(({ label }) => label.startsWith(STRUCTURE_LIMITS.HEADER_PLACEHOLDER_PREFIX))
        .map(({ col }) => columnName(ctx, col));
      const named = [...new Set(labels.filter((l) => !l.startsWith(STRUCTURE_LIMITS.HEADER_PLACEHOLDER_PREFIX)))];
      // One oracle call at a time; a failed call ends the check
      const unclear: string[] = [];
      for (const label of named) {
        if (await env.oracle.judge(clarityPrompt(label))) unclear.push(label);
      }

      const problems: string[] = [];
      if (missing.length > 0) problems.push(`missing headers in ${listExamples(missing)}`);
      if (unclear.length > 0) problems.push(`unclear headers ${listExamples(unclear.map((l) => `"${l}"`))}`);
      return problems.length > 0
        ? fail(`Column headers need attention: ${problems.join('; ')}`)
        : pass(`All ${labels.length} column headers are present and clear`);
    },

    checkHandlingOfMissingValues: (ctx) => {
      const findings: string[] = [];
      ctx.header.labels.forEach((_, col) => {
        const values = dataColumn(ctx, col);
        if (values.every(isBlank)) return;
        const notations = missingNotations(values);
        if (notations.length >= 2) findings.push(`${columnName(ctx, col)}: ${notations.join(', ')}`);
      });
      return findings.length > 0
        ? fail(`Missing values are written in more than one way: ${listExamples(findings)}`)
        : pass('Missing values are written consistently');
    },
  };
}
