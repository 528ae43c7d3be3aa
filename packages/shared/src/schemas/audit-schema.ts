import { z } from 'zod';
import { SHEET_LIMITS } from '../constants/limits';

const rowSchema = z.coerce.number().int().min(1).max(SHEET_LIMITS.MAX_ROWS);

/** Hints arrive as query-string values, hence the coercion */
export const auditHintsSchema = z
  .object({
    sheetName: z.string().trim().min(1).max(255).optional(),
    headerStartRow: rowSchema.optional(),
    headerEndRow: rowSchema.optional(),
  })
  .refine((h) => h.headerEndRow === undefined || h.headerStartRow !== undefined, {
    message: 'headerEndRow requires headerStartRow',
    path: ['headerEndRow'],
  })
  .refine(
    (h) =>
      h.headerStartRow === undefined ||
      h.headerEndRow === undefined ||
      h.headerEndRow >= h.headerStartRow,
    { message: 'headerEndRow must be >= headerStartRow', path: ['headerEndRow'] },
  );
