/** Scalar value of one cell; null means empty */
export type CellValue = string | number | boolean | null;

export type GridRow = readonly CellValue[];

/** Rectangular, read-only grid of cell values (0-based rows and columns) */
export type RawGrid = readonly GridRow[];

export interface RawSheet {
  readonly name: string;
  readonly grid: RawGrid;
}

export const FILE_FORMATS = ['csv', 'xls', 'xlsx'] as const;
export type FileFormat = (typeof FILE_FORMATS)[number];

/** Inclusive, 0-based cell range */
export interface CellRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}
