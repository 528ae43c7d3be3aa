import {
  CHECK_LIMITS,
  COMPANION_SHEET_KEYWORDS,
  cellToText,
  isBlank,
  isBlankRow,
  type CompanionSheetKind,
  type Level3CapabilityName,
  type RawSheet,
  type TableContext,
} from '@tabaudit/shared';
import type { WorkbookHandle } from '../workbook/workbook-types';
import type { Capability, CheckEnvironment } from './checker-shell';
import type { FormatHandler } from './format-handler';
import { columnName, dataColumn, fail, listExamples, pass } from './check-helpers';

const LONG_FORMAT_COLUMNS = [
  ['id', '変数名', '値'],
  ['id', 'variable', 'value'],
] as const;

function sheetText(sheet: RawSheet): string {
  return sheet.grid
    .slice(0, CHECK_LIMITS.COMPANION_SCAN_ROWS)
    .map((row) => row.map(cellToText).join(' '))
    .join('\n')
    .toLowerCase();
}

function companionPrompt(sheet: RawSheet, label: string): string {
  const preview = sheet.grid
    .slice(0, CHECK_LIMITS.COMPANION_SCAN_ROWS)
    .filter((row) => !isBlankRow(row))
    .map((row) => row.map(cellToText).join(' | '))
    .join('\n');
  return `Does the sheet "${sheet.name}" look like a ${label} that documents the main data table?\nFirst rows:\n${preview}`;
}

/**
 * Name keywords first, then content keywords, then the oracle for sheets with content.
 */
async function findCompanionSheet(
  kind: CompanionSheetKind,
  ctx: TableContext,
  workbook: WorkbookHandle,
  env: CheckEnvironment,
): Promise<{ sheet: string; by: string } | null> {
  const keywords = COMPANION_SHEET_KEYWORDS[kind];
  const others = workbook.sheets.filter((s) => s.name !== ctx.sheetName);

  const byName = others.find((s) => keywords.name.some((k) => s.name.toLowerCase().includes(k.toLowerCase())));
  if (byName) return { sheet: byName.name, by: 'sheet name' };

  const byContent = others.find((s) => {
    const text = sheetText(s);
    return keywords.content.some((k) => text.includes(k.toLowerCase()));
  });
  if (byContent) return { sheet: byContent.name, by: 'sheet content' };

  for (const sheet of others.filter((s) => s.grid.some((row) => !isBlankRow(row)))) {
    if (await env.oracle.judge(companionPrompt(sheet, keywords.label))) {
      return { sheet: sheet.name, by: 'content review' };
    }
  }
  return null;
}

function companionCheck(kind: CompanionSheetKind, handler: FormatHandler, env: CheckEnvironment): Capability {
  const { label } = COMPANION_SHEET_KEYWORDS[kind];
  return async (ctx, workbook) => {
    if (!handler.multiSheet) {
      return fail(`${handler.label} files hold a single table; provide the ${label} as a separate file`);
    }
    const found = await findCompanionSheet(kind, ctx, workbook, env);
    return found
      ? pass(`${label} found in sheet "${found.sheet}" (by ${found.by})`)
      : fail(`No ${label} sheet found in the workbook`);
  };
}

export function level3Capabilities(
  handler: FormatHandler,
  env: CheckEnvironment,
): Record<Level3CapabilityName, Capability> {
  return {
    checkCodeFormatForChoices: (ctx) => {
      const findings: string[] = [];
      ctx.header.labels.forEach((_, col) => {
        const values = dataColumn(ctx, col).filter((v) => !isBlank(v));
        const unique = [...new Set(values.map((v) => cellToText(v).trim()))];
        const repeats = values.length > unique.length;
        const textual = values.some((v) => typeof v === 'string' && !/^\d+$/.test(v.trim()));
        if (unique.length > 0 && unique.length < CHECK_LIMITS.CHOICE_MAX_UNIQUE && repeats && textual) {
          findings.push(`${columnName(ctx, col)}: ${listExamples(unique, 5)}`);
        }
      });
      return findings.length > 0
        ? fail(`Choices are stored as text rather than codes: ${findings.join('; ')}`)
        : pass('Choice columns use codes');
    },

    checkCodebookExists: companionCheck('codebook', handler, env),
    checkQuestionMasterExists: companionCheck('questionMaster', handler, env),
    checkMetadataPresence: companionCheck('metadata', handler, env),

    checkLongFormatIfManyColumns: (ctx) => {
      const count = ctx.header.labels.length;
      if (count < CHECK_LIMITS.LONG_FORMAT_MIN_COLUMNS) {
        return pass(`${count} columns; a long layout is not needed`);
      }
      const labels = new Set(ctx.header.labels.map((l) => l.trim().toLowerCase()));
      const isLong = LONG_FORMAT_COLUMNS.some((set) => set.every((name) => labels.has(name)));
      return isLong
        ? pass('Table uses a long layout (ID, variable, value)')
        : fail(`${count} columns in a wide layout; consider a long layout with ID, variable and value columns`);
    },
  };
}
