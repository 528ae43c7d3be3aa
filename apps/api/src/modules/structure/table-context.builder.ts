import { Injectable, Logger } from '@nestjs/common';
import {
  STRUCTURE_LIMITS,
  cellToText,
  deepFreeze,
  fitRow,
  gridWidth,
  isBlank,
  isBlankRow,
  lastNonBlankColumn,
  lastNonBlankRow,
  type AuditHints,
  type CellValue,
  type HeaderModel,
  type NormalizedProposal,
  type RawGrid,
  type RawSheet,
  type StructureProposal,
  type StructureViolation,
  type StructureWarning,
  type TableContext,
} from '@tabaudit/shared';

export interface TableRegions {
  headerRows: CellValue[][];
  data: CellValue[][];
  upperAnnotations: CellValue[][];
  lowerAnnotations: CellValue[][];
  upperAnnotationRows: number[];
  lowerAnnotationRows: number[];
  headerWidth: number;
  dataWidth: number;
  /** Table width: the wider of header and data */
  width: number;
}

const placeholder = (col: number): string => `${STRUCTURE_LIMITS.HEADER_PLACEHOLDER_PREFIX}${col}`;
const syntheticLabel = (col: number): string => `${STRUCTURE_LIMITS.SYNTHETIC_LABEL_PREFIX}${col + 1}`;

function uniqueSorted(rows: readonly number[]): number[] {
  return [...new Set(rows)].sort((a, b) => a - b);
}

/**
 * Turns an untrusted structure proposal into a validated, immutable TableContext.
 * Never throws for bad proposals: every violation has a deterministic repair.
 */
@Injectable()
export class TableContextBuilder {
  private readonly logger = new Logger(TableContextBuilder.name);

  validate(proposal: StructureProposal | null, rowCount: number): StructureViolation[] {
    const violations: StructureViolation[] = [];
    if (rowCount <= 1) {
      violations.push({ kind: 'grid-too-small', detail: `Sheet has ${rowCount} row(s)` });
    }
    if (!proposal) {
      violations.push({ kind: 'proposal-missing', detail: 'No structure proposal available' });
      return violations;
    }

    const inRange = (row: number): boolean => Number.isInteger(row) && row >= 0 && row < rowCount;
    const { headerRows, dataStart, dataEnd, annotationRows } = proposal;

    if (headerRows.length === 0) {
      violations.push({ kind: 'header-missing', detail: 'No header rows proposed' });
    }
    const badHeaders = headerRows.filter((r) => !inRange(r));
    if (badHeaders.length > 0) {
      violations.push({ kind: 'header-out-of-range', detail: `Header rows ${badHeaders.join(', ')} outside 0..${rowCount - 1}` });
    }

    if (dataStart === null) {
      violations.push({ kind: 'data-start-missing', detail: 'No data start proposed' });
    } else if (!inRange(dataStart)) {
      violations.push({ kind: 'data-start-out-of-range', detail: `Data start ${dataStart} outside 0..${rowCount - 1}` });
    }
    if (dataEnd === null) {
      violations.push({ kind: 'data-end-missing', detail: 'No data end proposed' });
    } else if (!inRange(dataEnd)) {
      violations.push({ kind: 'data-end-out-of-range', detail: `Data end ${dataEnd} outside 0..${rowCount - 1}` });
    }

    if (dataStart !== null && dataEnd !== null) {
      if (dataStart > dataEnd) {
        violations.push({ kind: 'data-inverted', detail: `Data start ${dataStart} is after data end ${dataEnd}` });
      }
      const overlapping = headerRows.filter((r) => r >= dataStart && r <= dataEnd);
      if (overlapping.length > 0) {
        violations.push({ kind: 'header-overlaps-data', detail: `Header rows ${overlapping.join(', ')} inside the data range` });
      }
    }

    const badNotes = annotationRows.filter((r) => !inRange(r));
    if (badNotes.length > 0) {
      violations.push({ kind: 'annotation-out-of-range', detail: `Annotation rows ${badNotes.join(', ')} outside the sheet` });
    }
    const tableNotes = annotationRows.filter(
      (r) =>
        headerRows.includes(r) ||
        (dataStart !== null && dataEnd !== null && r >= dataStart && r <= dataEnd),
    );
    if (tableNotes.length > 0) {
      violations.push({ kind: 'annotation-overlaps-table', detail: `Annotation rows ${tableNotes.join(', ')} inside the table` });
    }
    return violations;
  }

  repair(
    violations: readonly StructureViolation[],
    proposal: StructureProposal | null,
    rowCount: number,
  ): NormalizedProposal {
    if (rowCount <= 1 || violations.some((v) => v.kind === 'grid-too-small')) {
      return {
        headerRows: rowCount === 1 ? [0] : [],
        dataStart: rowCount,
        dataEnd: rowCount - 1,
        annotationRows: [],
      };
    }

    const last = rowCount - 1;
    const inRange = (row: number): boolean => Number.isInteger(row) && row >= 0 && row <= last;
    const clamp = (row: number): number => Math.min(Math.max(Math.trunc(row), 0), last);

    const validHeaders = uniqueSorted((proposal?.headerRows ?? []).filter(inRange));
    const headerRows = validHeaders.length > 0 ? validHeaders : [0];
    const headerMax = Math.max(...headerRows);

    let dataStart = clamp(proposal?.dataStart ?? headerMax + 1);
    let dataEnd = clamp(proposal?.dataEnd ?? last);
    if (dataStart > dataEnd) dataEnd = last;
    if (dataStart <= headerMax) {
      dataStart = headerMax + 1;
      if (dataStart > last) {
        dataEnd = headerMax;
      } else if (dataEnd < dataStart) {
        dataEnd = last;
      }
    }

    const annotationRows = uniqueSorted(
      (proposal?.annotationRows ?? []).filter(
        (r) => inRange(r) && !headerRows.includes(r) && (r < dataStart || r > dataEnd),
      ),
    );
    return { headerRows, dataStart, dataEnd, annotationRows };
  }

  buildHeader(grid: RawGrid, headerRows: readonly number[], width: number): HeaderModel {
    const texts = headerRows.map((r) =>
      fitRow(grid[r] ?? [], width).map((cell) => (isBlank(cell) ? '' : cellToText(cell).trim())),
    );

    // Spanning group labels: fill right across every level but the last
    for (let level = 0; level < texts.length - 1; level++) {
      let carry = '';
      texts[level] = (texts[level] ?? []).map((text) => {
        if (text !== '') carry = text;
        return text || carry;
      });
    }
    // Then fill down within each column
    for (let level = 1; level < texts.length; level++) {
      const above = texts[level - 1] ?? [];
      texts[level] = (texts[level] ?? []).map((text, col) => text || (above[col] ?? ''));
    }

    const labels = Array.from({ length: width }, (_, col) => {
      const parts: string[] = [];
      for (const levelTexts of texts) {
        const text = levelTexts[col] ?? '';
        if (text !== '' && parts[parts.length - 1] !== text) parts.push(text);
      }
      return parts.length > 0 ? parts.join(STRUCTURE_LIMITS.HEADER_LEVEL_SEPARATOR) : placeholder(col);
    });
    const levels = texts.length > 0
      ? texts.map((levelTexts) => levelTexts.map((text, col) => text || placeholder(col)))
      : [labels];

    return { labels, levels, synthetic: false };
  }

  sliceRegions(grid: RawGrid, normalized: NormalizedProposal): TableRegions {
    const { headerRows, dataStart, dataEnd } = normalized;
    const fullWidth = gridWidth(grid);
    const headerRaw = headerRows.map((r) => grid[r] ?? []);
    const dataRaw = grid.slice(dataStart, dataEnd + 1);

    const headerWidth = lastNonBlankColumn(headerRaw) + 1;
    const dataWidth = lastNonBlankColumn(dataRaw) + 1;
    const width = Math.max(headerWidth, dataWidth);

    const upperAnnotationRows: number[] = [];
    for (let r = 0; r < Math.min(dataStart, grid.length); r++) {
      if (!headerRows.includes(r)) upperAnnotationRows.push(r);
    }
    const lowerAnnotationRows: number[] = [];
    for (let r = Math.max(dataEnd + 1, 0); r < grid.length; r++) {
      if (!headerRows.includes(r)) lowerAnnotationRows.push(r);
    }
    const fullRow = (r: number): CellValue[] => fitRow(grid[r] ?? [], fullWidth);

    return {
      headerRows: headerRaw.map((row) => fitRow(row, width)),
      data: dataRaw.map((row) => fitRow(row, width)),
      upperAnnotations: upperAnnotationRows.map(fullRow),
      lowerAnnotations: lowerAnnotationRows.map(fullRow),
      upperAnnotationRows,
      lowerAnnotationRows,
      headerWidth,
      dataWidth,
      width,
    };
  }

  /**
   * Caller-supplied 1-based header rows. Data runs from the row after the header
   * to the last non-blank row. Rows past the sheet are clamped to its last row.
   */
  proposalFromHints(hints: AuditHints, grid: RawGrid): StructureProposal | null {
    if (hints.headerStartRow === undefined) return null;
    const lastRow = Math.max(grid.length - 1, 0);
    const first = Math.min(hints.headerStartRow - 1, lastRow);
    const lastHeader = Math.min((hints.headerEndRow ?? hints.headerStartRow) - 1, lastRow);
    return {
      headerRows: Array.from({ length: lastHeader - first + 1 }, (_, i) => first + i),
      dataStart: lastHeader + 1,
      dataEnd: lastNonBlankRow(grid),
      annotationRows: [],
    };
  }

  build(sheet: RawSheet, proposal: StructureProposal | null): TableContext {
    const { grid } = sheet;
    const violations = this.validate(proposal, grid.length);
    const normalized = this.repair(violations, proposal, grid.length);
    const warnings: StructureWarning[] = [];

    if (violations.length > 0) {
      const kinds = violations.map((v) => v.kind).join(', ');
      this.logger.warn(`Repaired structure of "${sheet.name}": ${kinds}`);
      warnings.push({ kind: 'proposal-repaired', message: violations.map((v) => v.detail).join('; ') });
    }

    const regions = this.sliceRegions(grid, normalized);
    let header = this.buildHeader(grid, normalized.headerRows, regions.width);

    if (regions.data.length > 0 && regions.dataWidth !== regions.headerWidth) {
      warnings.push({
        kind: 'header-width-mismatch',
        message: `Data spans ${regions.dataWidth} columns but the header ${regions.headerWidth}`,
      });
      header = { ...header, labels: header.labels.map((_, col) => syntheticLabel(col)), synthetic: true };
    }
    if (regions.data.length === 0 && grid.some((row) => !isBlankRow(row))) {
      warnings.push({ kind: 'empty-data', message: 'No data rows below the header' });
    }

    this.logger.debug(
      `Built "${sheet.name}": header ${normalized.headerRows.join(',') || '-'}, data ${normalized.dataStart}..${normalized.dataEnd}`,
    );

    return deepFreeze<TableContext>({
      sheetName: sheet.name,
      header,
      headerRows: regions.headerRows,
      data: regions.data,
      upperAnnotations: regions.upperAnnotations,
      lowerAnnotations: regions.lowerAnnotations,
      rowIndices: {
        headerRows: normalized.headerRows,
        dataStart: normalized.dataStart,
        dataEnd: normalized.dataEnd,
        annotationRows: normalized.annotationRows,
        upperAnnotationRows: regions.upperAnnotationRows,
        lowerAnnotationRows: regions.lowerAnnotationRows,
      },
      warnings,
    });
  }
}
