import path from 'node:path';
import {
  CHECK_LIMITS,
  PLATFORM_DEPENDENT_PATTERN,
  buildRangeRef,
  cellToText,
  colIndexToLetter,
  isBlank,
  isBlankRow,
  isSlashDate,
  type Level1CapabilityName,
  type RawGrid,
  type TableContext,
} from '@tabaudit/shared';
import type { Capability, CheckEnvironment } from './checker-shell';
import { tableRowSpan, type FormatHandler } from './format-handler';
import { dataCells, evaluateSupport, fail, listExamples, pass, quote, tableCells } from './check-helpers';

const LAYOUT_SPACES = /\u3000|^[ \t]+\S|\S[ \t]+$|\S {2,}\S/;
const MULTI_VALUE = /[\n,;/]/;
const THOUSANDS = /^[+-]?\d{1,3}(?:,\d{3})+(?:\.\d+)?$/;

/** Runs of non-blank data rows; returns the grid row where each run starts */
function dataBlocks(ctx: TableContext): number[] {
  const starts: number[] = [];
  let inBlock = false;
  ctx.data.forEach((row, i) => {
    const filled = !isBlankRow(row);
    if (filled && !inBlock) starts.push(ctx.rowIndices.dataStart + i);
    inBlock = filled;
  });
  return starts;
}

/** Data rows that repeat the bottom header row */
function repeatedHeaderRows(ctx: TableContext): number[] {
  const header = ctx.headerRows[ctx.headerRows.length - 1];
  if (!header) return [];
  const texts = header.map((cell) => cellToText(cell).trim());
  if (texts.filter((t) => t !== '').length < 2) return [];
  const rows: number[] = [];
  ctx.data.forEach((row, i) => {
    const same = texts.every((text, col) => text === '' || cellToText(row[col] ?? null).trim() === text);
    if (same) rows.push(ctx.rowIndices.dataStart + i + 1);
  });
  return rows;
}

function layoutPrompt(samples: readonly string[]): string {
  return [
    'These cell values from a data table contain full-width spaces, runs of spaces, or leading/trailing spaces.',
    'Are the spaces used to align or lay out text visually, rather than being part of the data?',
    ...samples.map((s) => `- ${s}`),
  ].join('\n');
}

export function level1Capabilities(
  handler: FormatHandler,
  env: CheckEnvironment,
): Record<Level1CapabilityName, Capability> {
  return {
    checkValidFileFormat: (_ctx, workbook, filePath) => {
      const ext = path.extname(filePath).toLowerCase();
      if (!handler.extensions.includes(ext) || workbook.format !== handler.format) {
        return fail(`"${ext || path.basename(filePath)}" is not a readable ${handler.label} file`);
      }
      return handler.formatCaveat
        ? pass(`${handler.label} can be read by machines (${handler.formatCaveat})`)
        : pass(`${handler.label} is a machine-readable format`);
    },

    checkNoImagesOrObjects: (_ctx, workbook) =>
      evaluateSupport(handler.listDrawings(workbook), (parts) => {
        if (parts.length === 0) return pass('No images or embedded objects found');
        const count = parts.reduce((sum, p) => sum + p.anchors, 0);
        return fail(`Found ${count} image(s) or object(s) in ${listExamples(parts.map((p) => p.path))}`);
      }),

    checkOneTablePerSheet: (ctx) => {
      const blocks = dataBlocks(ctx);
      const repeated = repeatedHeaderRows(ctx);
      const problems: string[] = [];
      if (blocks.length > 1) {
        problems.push(
          `blank rows split the data into ${blocks.length} blocks starting at rows ${listExamples(blocks.map((r) => String(r + 1)))}`,
        );
      }
      if (repeated.length > 0) {
        problems.push(`the header is repeated at rows ${listExamples(repeated.map(String))}`);
      }
      return problems.length > 0
        ? fail(`Sheet "${ctx.sheetName}" holds more than one table: ${problems.join('; ')}`)
        : pass(`Sheet "${ctx.sheetName}" holds a single table`);
    },

    checkNoHiddenRowsOrColumns: (ctx, workbook) =>
      evaluateSupport(handler.listHiddenLines(workbook, ctx.sheetName), ({ rows, columns }) => {
        if (rows.length === 0 && columns.length === 0) return pass('No hidden rows or columns');
        const parts: string[] = [];
        if (rows.length > 0) parts.push(`hidden rows ${listExamples(rows.map((r) => String(r + 1)))}`);
        if (columns.length > 0) parts.push(`hidden columns ${listExamples(columns.map(colIndexToLetter))}`);
        return fail(`Found ${parts.join('; ')}`);
      }),

    checkNoNotesOutsideTable: (ctx) => {
      const notes: string[] = [];
      const collect = (rows: RawGrid, indices: readonly number[]): void => {
        rows.forEach((row, i) => {
          const first = row.find((cell) => !isBlank(cell));
          if (first !== undefined) notes.push(`row ${(indices[i] ?? i) + 1} ${quote(first)}`);
        });
      };
      collect(ctx.upperAnnotations, ctx.rowIndices.upperAnnotationRows);
      collect(ctx.lowerAnnotations, ctx.rowIndices.lowerAnnotationRows);
      return notes.length > 0
        ? fail(`Notes found outside the table: ${listExamples(notes)}`)
        : pass('No notes outside the table');
    },

    checkNoMergedCells: (ctx, workbook) =>
      evaluateSupport(handler.listMergedRanges(workbook, ctx.sheetName), (ranges) => {
        const { start, end } = tableRowSpan(ctx);
        const inTable = ranges.filter((r) => r.startRow <= end && r.endRow >= start);
        return inTable.length > 0
          ? fail(`Merged cells in the table: ${listExamples(inTable.map(buildRangeRef))}`)
          : pass('No merged cells in the table');
      }),

    checkNoFormatBasedSemantics: (ctx, workbook) => {
      const span = { start: ctx.rowIndices.dataStart, end: ctx.rowIndices.dataEnd };
      return evaluateSupport(handler.listStyledCells(workbook, ctx.sheetName, span), (findings) =>
        findings.length > 0
          ? fail(
              `Formatting may carry meaning in ${findings.length} data cell(s): ${listExamples(
                findings.map((f) => `${f.ref} (${f.traits.join(', ')})`),
              )}`,
            )
          : pass('No colour, font or size formatting in data cells'),
      );
    },

    checkNoWhitespaceFormatting: async (ctx) => {
      const samples = tableCells(ctx)
        .filter((cell) => typeof cell.value === 'string' && LAYOUT_SPACES.test(cell.value))
        .slice(0, CHECK_LIMITS.WHITESPACE_SAMPLE_LIMIT)
        .map((cell) => `${cell.ref} ${quote(cell.value)}`);
      if (samples.length === 0) return pass('No spacing used for layout');

      const isLayout = await env.oracle.judge(layoutPrompt(samples));
      env.logger.debug?.(`Whitespace samples judged as ${isLayout ? 'layout' : 'data'}`);
      return isLayout
        ? fail(`Spaces are used to lay out text: ${listExamples(samples)}`)
        : pass(`Spaces in ${samples.length} cell(s) are part of the data`);
    },

    checkSingleDataPerCell: (ctx) => {
      const hits = dataCells(ctx)
        .filter(({ value }) => {
          if (typeof value !== 'string' || !MULTI_VALUE.test(value)) return false;
          const text = value.trim();
          return !isSlashDate(text) && !THOUSANDS.test(text);
        })
        .map((cell) => `${cell.ref} ${quote(cell.value)}`);
      return hits.length > 0
        ? fail(`Cells holding several values: ${listExamples(hits)}`)
        : pass('Each cell holds a single value');
    },

    checkNoPlatformDependentCharacters: (ctx) => {
      const hits = tableCells(ctx)
        .filter(({ value }) => typeof value === 'string' && PLATFORM_DEPENDENT_PATTERN.test(value))
        .map((cell) => `${cell.ref} ${quote(cell.value)}`);
      return hits.length > 0
        ? fail(`Platform-dependent characters found: ${listExamples(hits)}`)
        : pass('No platform-dependent characters');
    },

    checkFormatNativeStructure: (ctx, workbook) =>
      evaluateSupport(handler.inspectNativeStructure(workbook, ctx), (issues) =>
        issues.length > 0
          ? fail(`${handler.label} structure problems: ${listExamples(issues)}`)
          : pass(`No ${handler.label} structure problems`),
      ),
  };
}
