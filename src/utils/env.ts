import { z } from 'zod';

export const DB_TYPES = ['mysql', 'sqljs'] as const;
export type DbType = (typeof DB_TYPES)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8787),
  CORS_ORIGIN: z.string().optional(),

  DB_TYPE: z.enum(DB_TYPES).default('mysql'),
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }).min(1, 'DATABASE_URL is required'),

  GEMINI_API_KEY: z.string({ required_error: 'GEMINI_API_KEY is required' }).min(1, 'GEMINI_API_KEY is required'),
  GEMINI_CHAT_MODEL: z.string().min(1).default('gemini-2.5-flash-lite'),
  GEMINI_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(4096),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  GEMINI_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  GEMINI_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
});

export type Env = z.infer<typeof envSchema>;

/** `ConfigModule.forRoot({ validate })` hook; throws at startup on bad config. */
export function validateEnv(config: Record<string, unknown>): Env {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid environment configuration:\n  ${problems.join('\n  ')}`);
  }
  return parsed.data;
}
