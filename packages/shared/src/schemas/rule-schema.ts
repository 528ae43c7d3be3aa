import { z } from 'zod';

export const ruleSeveritySchema = z.enum(['high', 'medium', 'low']);

export const ruleDescriptorSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1),
  severity: ruleSeveritySchema,
  recommendation: z.string().default(''),
  capability: z.string().regex(/^[A-Za-z_$][\w$]*$/, 'Capability must be an identifier'),
});

export const ruleSetSchema = z
  .array(ruleDescriptorSchema)
  .refine((rules) => new Set(rules.map((r) => r.id)).size === rules.length, {
    message: 'Rule ids must be unique',
  });
