import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  STRUCTURE_LIMITS,
  cellToText,
  isBlankRow,
  structureResponseSchema,
  toStructureProposal,
  type RawGrid,
  type RawSheet,
  type StructureProposal,
} from '@tabaudit/shared';
import { errorMessage } from '../../common/errors/audit-errors';
import { OpenAIClientService } from './openai-client.service';

/** Proposes table boundaries and the main sheet. Answers are untrusted. */
export interface StructureInferenceOracle {
  proposeStructure(sheet: RawSheet): Promise<StructureProposal | null>;
  selectMainSheet(sheets: readonly RawSheet[]): Promise<string | null>;
}

export const STRUCTURE_ORACLE = Symbol('STRUCTURE_ORACLE');

const STRUCTURE_SYSTEM_PROMPT = `You analyse the layout of a spreadsheet table.
Rows are shown as "<row number>: <cells separated by |>". Row numbers start at 1.
Return only a JSON object:
{"column_rows": [<header row numbers>], "data_start": <first data row>, "data_end": <last data row>, "annotation_rows": [<title, note or footnote rows outside the table>]}`;

const SHEET_SYSTEM_PROMPT =
  'You are shown several sheets of one workbook. Reply with the exact name of the sheet ' +
  'that holds the main data table, and nothing else.';

function formatRow(grid: RawGrid, index: number): string {
  const row = grid[index] ?? [];
  return `${index + 1}: ${row.map(cellToText).join(' | ')}`;
}

/**
 * First and last `count` rows with 1-based numbers. Short grids are shown whole.
 */
export function buildPreview(grid: RawGrid, count: number = STRUCTURE_LIMITS.PREVIEW_ROW_COUNT): string {
  if (grid.length <= count * 2) {
    return grid.map((_, i) => formatRow(grid, i)).join('\n');
  }
  const head = Array.from({ length: count }, (_, i) => formatRow(grid, i));
  const tail = Array.from({ length: count }, (_, i) => formatRow(grid, grid.length - count + i));
  return [...head, '...', ...tail].join('\n');
}

/** Pull the first JSON object out of an answer that may be wrapped in a ```json fence */
export function extractJsonObject(text: string): unknown {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const body = fenced?.[1] ?? text;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  try {
    const parsed: unknown = JSON.parse(body.slice(start, end + 1));
    return parsed;
  } catch {
    return null;
  }
}

export function parseStructureAnswer(text: string): StructureProposal | null {
  const result = structureResponseSchema.safeParse(extractJsonObject(text));
  return result.success ? toStructureProposal(result.data) : null;
}

/** Exact name first, then the longest sheet name mentioned in the answer */
export function matchSheetName(answer: string, names: readonly string[]): string | null {
  const cleaned = answer.trim().replace(/^["'`「]+|["'`」.]+$/g, '');
  const exact = names.find((n) => n === cleaned);
  if (exact !== undefined) return exact;
  const mentioned = [...names]
    .sort((a, b) => b.length - a.length)
    .find((n) => n.length > 0 && answer.includes(n));
  return mentioned ?? null;
}

@Injectable()
export class LlmStructureOracle implements StructureInferenceOracle {
  private readonly logger = new Logger(LlmStructureOracle.name);

  constructor(
    private readonly client: OpenAIClientService,
    private readonly config: ConfigService,
  ) {}

  private get previewRows(): number {
    return this.config.get<number>('ORACLE_PREVIEW_ROWS') ?? STRUCTURE_LIMITS.PREVIEW_ROW_COUNT;
  }

  async proposeStructure(sheet: RawSheet): Promise<StructureProposal | null> {
    if (!this.client.isAvailable()) {
      this.logger.warn('Oracle unavailable, table structure falls back to defaults');
      return null;
    }
    try {
      const response = await this.client.chat({
        systemPrompt: STRUCTURE_SYSTEM_PROMPT,
        userMessage: `Sheet "${sheet.name}" (${sheet.grid.length} rows):\n${buildPreview(sheet.grid, this.previewRows)}`,
        responseFormat: 'json',
      });
      const proposal = parseStructureAnswer(response.content);
      if (!proposal) {
        this.logger.warn(`Unparsable structure answer for sheet "${sheet.name}"`);
      }
      return proposal;
    } catch (err) {
      this.logger.warn(`Structure inference failed for sheet "${sheet.name}": ${errorMessage(err)}`);
      return null;
    }
  }

  async selectMainSheet(sheets: readonly RawSheet[]): Promise<string | null> {
    const candidates = sheets.filter((s) => s.grid.some((row) => !isBlankRow(row)));
    if (candidates.length <= 1) return candidates[0]?.name ?? null;
    if (!this.client.isAvailable()) return null;

    const previews = candidates
      .map((s) => `### ${s.name}\n${buildPreview(s.grid.slice(0, this.previewRows), this.previewRows)}`)
      .join('\n\n');
    try {
      const response = await this.client.chat({
        systemPrompt: SHEET_SYSTEM_PROMPT,
        userMessage: previews,
        maxTokens: 50,
      });
      return matchSheetName(response.content, candidates.map((s) => s.name));
    } catch (err) {
      this.logger.warn(`Main sheet selection failed: ${errorMessage(err)}`);
      return null;
    }
  }
}
