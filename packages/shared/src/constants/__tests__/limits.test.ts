import { describe, it, expect } from 'vitest';
import { FILE_LIMITS, STRUCTURE_LIMITS, CHECK_LIMITS } from '../limits';
import {
  LEVEL1_CAPABILITIES,
  LEVEL2_CAPABILITIES,
  LEVEL3_CAPABILITIES,
  LEVEL_CAPABILITIES,
} from '../capabilities';

describe('FILE_LIMITS', () => {
  it('has 50MB max upload size', () => {
    expect(FILE_LIMITS.MAX_UPLOAD_SIZE_BYTES).toBe(50 * 1024 * 1024);
  });

  it('allows csv, xls and xlsx extensions', () => {
    expect(FILE_LIMITS.ALLOWED_EXTENSIONS).toEqual(['.csv', '.xls', '.xlsx']);
  });
});

describe('STRUCTURE_LIMITS', () => {
  it('previews 10 rows from each end', () => {
    expect(STRUCTURE_LIMITS.PREVIEW_ROW_COUNT).toBe(10);
  });

  it('names blank headers with a positional placeholder', () => {
    expect(STRUCTURE_LIMITS.HEADER_PLACEHOLDER_PREFIX).toBe('Unnamed: ');
  });
});

describe('CHECK_LIMITS', () => {
  it('caps reported examples at 10', () => {
    expect(CHECK_LIMITS.MAX_EXAMPLES).toBe(10);
  });

  it('treats 80% numeric values as a numeric column', () => {
    expect(CHECK_LIMITS.NUMERIC_COLUMN_RATIO).toBe(0.8);
    expect(CHECK_LIMITS.NUMERIC_PURITY_RATIO).toBe(0.99);
  });

  it('accepts font sizes from 9 to 13', () => {
    expect(CHECK_LIMITS.FONT_SIZE_MIN).toBe(9);
    expect(CHECK_LIMITS.FONT_SIZE_MAX).toBe(13);
  });
});

describe('capability sets', () => {
  it('has 11, 4 and 5 capabilities per level', () => {
    expect(LEVEL1_CAPABILITIES).toHaveLength(11);
    expect(LEVEL2_CAPABILITIES).toHaveLength(4);
    expect(LEVEL3_CAPABILITIES).toHaveLength(5);
  });

  it('indexes the sets by level', () => {
    expect(LEVEL_CAPABILITIES[2]).toBe(LEVEL2_CAPABILITIES);
  });

  it('has no duplicate names across levels', () => {
    const all = [...LEVEL1_CAPABILITIES, ...LEVEL2_CAPABILITIES, ...LEVEL3_CAPABILITIES];
    expect(new Set(all).size).toBe(all.length);
  });
});
