import { z } from 'zod';

const envSchema = z.object({
  AI_API_KEY: z.string().min(1).optional(),
  AI_BASE_URL: z.string().url().optional(),
  AI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  AI_MAX_TOKENS: z.coerce.number().int().min(1).default(1024),
  AI_TIMEOUT_MS: z.coerce.number().int().min(1_000).default(60_000),
  AI_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  ORACLE_PREVIEW_ROWS: z.coerce.number().int().min(1).max(100).default(10),
  RULES_DIR: z.string().min(1).optional(),
  CHECK_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(1),
  MAX_UPLOAD_SIZE_MB: z.coerce.number().int().min(1).max(200).default(50),
  PORT: z.coerce.number().int().default(4000),
  FRONTEND_URL: z.string().default('http://localhost:3000'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}
