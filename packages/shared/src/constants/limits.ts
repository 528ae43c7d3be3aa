/** Upload and file limits */
export const FILE_LIMITS = {
  MAX_UPLOAD_SIZE_BYTES: 50 * 1024 * 1024, // 50MB
  ALLOWED_EXTENSIONS: ['.csv', '.xls', '.xlsx'] as const,
  CSV_SHEET_NAME: 'CSV',
} as const;

/** Structure inference and table building */
export const STRUCTURE_LIMITS = {
  PREVIEW_ROW_COUNT: 10,
  HEADER_PLACEHOLDER_PREFIX: 'Unnamed: ',
  SYNTHETIC_LABEL_PREFIX: 'column_',
  HEADER_LEVEL_SEPARATOR: ' / ',
} as const;

/** Worksheet bounds shared by XLSX and XLS */
export const SHEET_LIMITS = {
  MAX_ROWS: 1_048_576,
} as const;

/** Thresholds used by the rule checks */
export const CHECK_LIMITS = {
  MAX_EXAMPLES: 10,
  WHITESPACE_SAMPLE_LIMIT: 10,
  NUMERIC_COLUMN_RATIO: 0.8,
  NUMERIC_PURITY_RATIO: 0.99,
  CHOICE_MAX_UNIQUE: 10,
  LONG_FORMAT_MIN_COLUMNS: 10,
  COMPANION_SCAN_ROWS: 10,
  FONT_SIZE_MIN: 9,
  FONT_SIZE_MAX: 13,
} as const;
