import { z } from 'zod';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  DATABASE_URL: z.string().url().optional(),
  REDIS_URL: z.string().url().optional(),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  APPLYFLOW_TABLE_PREFIX: z.string().regex(/^[a-z_]*$/).default('af_'),
  APPLYFLOW_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  APPLYFLOW_API_PORT: intFromEnv(3200),
  APPLYFLOW_WORKER_ID: z.string().min(1).optional(),
  APPLYFLOW_WORKERS: z.coerce.number().int().positive().optional(),
  APPLYFLOW_MAX_ATTEMPTS: z.coerce.number().int().positive().optional(),
  APPLYFLOW_AUTOMATION_LEVEL: z.enum(['full', 'assisted']).optional(),
  APPLYFLOW_TAILORING_MODE: z.enum(['conservative', 'moderate', 'aggressive']).optional(),
  APPLYFLOW_REVIEW_TIMEOUT_HOURS: z.coerce.number().positive().optional(),
  APPLYFLOW_ANALYSIS_MODEL: z.string().min(1).default('claude-3-5-sonnet-20241022'),
  APPLYFLOW_GENERATION_MODEL: z.string().min(1).default('claude-3-5-sonnet-20241022'),
  // Test mode: submissions go through the dry-run executor instead of a real platform.
  APPLYFLOW_DRY_RUN: z
    .enum(['true', 'false'])
    .default('true')
    .transform((v) => v === 'true'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Parse an explicit environment map without touching the cached process env. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}
