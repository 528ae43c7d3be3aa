import type { RawGrid } from './grid-types';

/**
 * Boundaries proposed by the structure oracle, already converted to 0-based rows.
 * Nothing here is trusted: rows may be out of range, overlapping or missing.
 */
export interface StructureProposal {
  headerRows: readonly number[];
  dataStart: number | null;
  dataEnd: number | null;
  annotationRows: readonly number[];
}

export const VIOLATION_KINDS = [
  'proposal-missing',
  'grid-too-small',
  'header-missing',
  'header-out-of-range',
  'data-start-missing',
  'data-start-out-of-range',
  'data-end-missing',
  'data-end-out-of-range',
  'data-inverted',
  'header-overlaps-data',
  'annotation-out-of-range',
  'annotation-overlaps-table',
] as const;
export type ViolationKind = (typeof VIOLATION_KINDS)[number];

export interface StructureViolation {
  kind: ViolationKind;
  detail: string;
}

/** A proposal that satisfies every structural invariant. Empty data is dataEnd = dataStart - 1. */
export interface NormalizedProposal {
  headerRows: number[];
  dataStart: number;
  dataEnd: number;
  annotationRows: number[];
}

export interface HeaderModel {
  /** One composed label per table column, never blank */
  labels: readonly string[];
  /** levels[level][column], top header row first */
  levels: readonly (readonly string[])[];
  /** True when labels were replaced by positional names */
  synthetic: boolean;
}

export type StructureWarningKind = 'proposal-repaired' | 'header-width-mismatch' | 'empty-data';

export interface StructureWarning {
  kind: StructureWarningKind;
  message: string;
}

/** Grid row numbers behind every slice of a TableContext */
export interface RowIndices {
  headerRows: readonly number[];
  dataStart: number;
  dataEnd: number;
  annotationRows: readonly number[];
  upperAnnotationRows: readonly number[];
  lowerAnnotationRows: readonly number[];
}

/** Canonical, deep-frozen view of the main table of one sheet */
export interface TableContext {
  sheetName: string;
  header: HeaderModel;
  /** Raw header rows, cut to the table width */
  headerRows: RawGrid;
  data: RawGrid;
  upperAnnotations: RawGrid;
  lowerAnnotations: RawGrid;
  rowIndices: RowIndices;
  warnings: readonly StructureWarning[];
}
