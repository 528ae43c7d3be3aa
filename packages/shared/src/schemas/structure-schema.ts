import { z } from 'zod';
import type { StructureProposal } from '../types';

const rowNumberSchema = z.coerce.number().int();
const optionalRowSchema = z.union([z.null(), rowNumberSchema]).optional();

/**
 * Oracle answer describing the table layout. Row numbers are 1-based as shown in the preview.
 */
export const structureResponseSchema = z.object({
  column_rows: z
    .union([z.array(rowNumberSchema), rowNumberSchema])
    .optional()
    .transform((v) => (v === undefined ? [] : Array.isArray(v) ? v : [v])),
  data_start: optionalRowSchema,
  data_end: optionalRowSchema,
  annotation_rows: z.array(rowNumberSchema).optional().default([]),
});

export type StructureResponse = z.infer<typeof structureResponseSchema>;

/** Convert the 1-based oracle answer into a 0-based proposal */
export function toStructureProposal(response: StructureResponse): StructureProposal {
  const shift = (row: number | null | undefined): number | null =>
    row === null || row === undefined ? null : row - 1;
  return {
    headerRows: response.column_rows.map((r) => r - 1),
    dataStart: shift(response.data_start),
    dataEnd: shift(response.data_end),
    annotationRows: response.annotation_rows.map((r) => r - 1),
  };
}
