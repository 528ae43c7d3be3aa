import { describe, it, expect, vi } from 'vitest';
import { ConfigService } from '@nestjs/config';
import type { RawSheet } from '@tabaudit/shared';
import { OpenAIClientService, type LLMRequest } from '../openai-client.service';
import {
  LlmStructureOracle,
  buildPreview,
  extractJsonObject,
  matchSheetName,
  parseStructureAnswer,
} from '../structure-oracle.service';

function makeGrid(rows: number): (string | number)[][] {
  return Array.from({ length: rows }, (_, i) => [`r${i + 1}`, i + 1]);
}

function makeOracle(answer?: string | Error) {
  const config = new ConfigService({ ORACLE_PREVIEW_ROWS: 2 });
  const client = new OpenAIClientService(config);
  vi.spyOn(client, 'isAvailable').mockReturnValue(answer !== undefined);
  const chat = vi.fn(async (_request: LLMRequest) => {
    if (answer instanceof Error) throw answer;
    return { content: answer ?? '', finishReason: 'stop' };
  });
  vi.spyOn(client, 'chat').mockImplementation(chat);
  return { oracle: new LlmStructureOracle(client, config), chat };
}

describe('buildPreview', () => {
  it('shows short grids whole with 1-based row numbers', () => {
    expect(buildPreview([['a', null], [1, true]], 10)).toBe('1: a | \n2: 1 | TRUE');
  });

  it('shows the first and last rows of long grids', () => {
    const preview = buildPreview(makeGrid(7), 2);
    expect(preview.split('\n')).toEqual(['1: r1 | 1', '2: r2 | 2', '...', '6: r6 | 6', '7: r7 | 7']);
  });
});

describe('extractJsonObject', () => {
  it('reads a fenced answer', () => {
    expect(extractJsonObject('Here:\n```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('reads a bare object surrounded by prose', () => {
    expect(extractJsonObject('Result {"a": [1, 2]} done')).toEqual({ a: [1, 2] });
  });

  it('returns null for broken JSON', () => {
    expect(extractJsonObject('{"a": ')).toBeNull();
    expect(extractJsonObject('no json')).toBeNull();
  });
});

describe('parseStructureAnswer', () => {
  it('converts to a 0-based proposal', () => {
    expect(parseStructureAnswer('{"column_rows":[3],"data_start":4,"data_end":9,"annotation_rows":[1]}')).toEqual({
      headerRows: [2],
      dataStart: 3,
      dataEnd: 8,
      annotationRows: [0],
    });
  });

  it('returns null when the answer is not an object', () => {
    expect(parseStructureAnswer('I cannot tell')).toBeNull();
  });
});

describe('matchSheetName', () => {
  const names = ['Sheet1', 'Sheet10', 'Data'];

  it('prefers an exact answer', () => {
    expect(matchSheetName(' "Sheet1" ', names)).toBe('Sheet1');
  });

  it('picks the longest mentioned name', () => {
    expect(matchSheetName('The main sheet is Sheet10.', names)).toBe('Sheet10');
  });

  it('returns null when no sheet is named', () => {
    expect(matchSheetName('unknown', names)).toBeNull();
  });
});

describe('LlmStructureOracle', () => {
  const sheet: RawSheet = { name: 'Data', grid: makeGrid(5) };

  it('returns null without calling the model when unavailable', async () => {
    const { oracle, chat } = makeOracle();
    await expect(oracle.proposeStructure(sheet)).resolves.toBeNull();
    expect(chat).not.toHaveBeenCalled();
  });

  it('parses the model answer', async () => {
    const { oracle } = makeOracle('```json\n{"column_rows": 1, "data_start": 2, "data_end": 5}\n```');
    await expect(oracle.proposeStructure(sheet)).resolves.toEqual({
      headerRows: [0],
      dataStart: 1,
      dataEnd: 4,
      annotationRows: [],
    });
  });

  it('sends the configured preview size', async () => {
    const { oracle, chat } = makeOracle('{}');
    await oracle.proposeStructure(sheet);
    expect(chat.mock.calls[0]?.[0]).toMatchObject({
      userMessage: 'Sheet "Data" (5 rows):\n1: r1 | 1\n2: r2 | 2\n...\n4: r4 | 4\n5: r5 | 5',
    });
  });

  it('returns null when the model call fails', async () => {
    const { oracle } = makeOracle(new Error('timeout'));
    await expect(oracle.proposeStructure(sheet)).resolves.toBeNull();
  });

  it('skips the model when only one sheet has content', async () => {
    const { oracle, chat } = makeOracle('Other');
    const empty: RawSheet = { name: 'Empty', grid: [] };
    await expect(oracle.selectMainSheet([empty, sheet])).resolves.toBe('Data');
    expect(chat).not.toHaveBeenCalled();
  });

  it('asks the model to choose among several sheets', async () => {
    const { oracle } = makeOracle('Answers');
    const answers: RawSheet = { name: 'Answers', grid: [['q1']] };
    await expect(oracle.selectMainSheet([sheet, answers])).resolves.toBe('Answers');
  });
});
