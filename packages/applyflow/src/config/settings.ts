import { z } from 'zod';
import { getEnv, type Env } from './env.js';
import { DEFAULT_LEASE_TTL_MS } from './resources.js';

const HOUR_MS = 60 * 60 * 1000;

// -1 means unlimited; zero would block the resource forever
const limitSchema = z
  .number()
  .int()
  .refine((v) => v === -1 || v > 0, { message: 'must be -1 (unlimited) or positive' });

const policyOverrideSchema = z.object({
  capacity: limitSchema.optional(),
  windowMs: z.number().int().positive().optional(),
  maxConcurrent: limitSchema.optional(),
  leaseTtlMs: z.number().int().positive().optional(),
});

const baseSettingsSchema = z.object({
  /** Parallel stage invocations across applications */
  workers: z.number().int().positive().default(3),
  pollIntervalMs: z.number().int().positive().default(5_000),
  /** Re-queue delay when the governor denies a lease without a retry hint */
  deferDelayMs: z.number().int().nonnegative().default(1_000),
  maxAttempts: z.number().int().positive().default(3),
  backoff: z
    .object({
      baseDelayMs: z.number().int().nonnegative().default(2_000),
      maxDelayMs: z.number().int().nonnegative().default(60_000),
      jitterRatio: z.number().min(0).max(1).default(0.2),
    })
    .default({}),
  stageTimeoutsMs: z
    .object({
      discovery: z.number().int().positive().default(120_000),
      analysis: z.number().int().positive().default(60_000),
      tailoring: z.number().int().positive().default(120_000),
      submission: z.number().int().positive().default(300_000),
      confirmation: z.number().int().positive().default(60_000),
    })
    .default({}),
  /** How often a submitted application is re-checked for a platform confirmation */
  confirmationPollMs: z.number().int().positive().default(60_000),
  /** A submission the platform has not confirmed after this long fails */
  confirmationTimeoutMs: z.number().int().positive().default(48 * HOUR_MS),
  /** Unresolved reviews are cancelled after this long */
  reviewTimeoutMs: z.number().int().positive().default(7 * 24 * HOUR_MS),
  defaultAutomationLevel: z.enum(['full', 'assisted']).default('assisted'),
  defaultTailoringMode: z.enum(['conservative', 'moderate', 'aggressive']).default('conservative'),
  sessions: z
    .object({
      perPlatform: z.record(z.number().int().positive()).default({}),
      maxConsecutiveErrors: z.number().int().positive().default(2),
    })
    .default({}),
  resources: z.record(policyOverrideSchema).default({}),
});

/**
 * A lease must outlive the longest stage that can hold it, otherwise the sweep
 * reclaims it from a stage that is still running.
 */
export const settingsSchema = baseSettingsSchema.superRefine((settings, ctx) => {
  const longestStageMs = Math.max(...Object.values(settings.stageTimeoutsMs));

  for (const [resourceId, override] of Object.entries(settings.resources)) {
    if (override.leaseTtlMs !== undefined && override.leaseTtlMs < longestStageMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['resources', resourceId, 'leaseTtlMs'],
        message: `must be at least the longest stage timeout (${longestStageMs}ms)`,
      });
    }
  }

  for (const [stage, timeoutMs] of Object.entries(settings.stageTimeoutsMs)) {
    if (timeoutMs <= DEFAULT_LEASE_TTL_MS) continue;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['stageTimeoutsMs', stage],
      message: `must not exceed the default lease TTL (${DEFAULT_LEASE_TTL_MS}ms)`,
    });
  }
});

export type OrchestratorSettings = z.infer<typeof settingsSchema>;
export type SettingsInput = z.input<typeof settingsSchema>;

function settingsFromEnv(env: Env): SettingsInput {
  const fromEnv: SettingsInput = {};
  if (env.APPLYFLOW_WORKERS !== undefined) fromEnv.workers = env.APPLYFLOW_WORKERS;
  if (env.APPLYFLOW_MAX_ATTEMPTS !== undefined) fromEnv.maxAttempts = env.APPLYFLOW_MAX_ATTEMPTS;
  if (env.APPLYFLOW_AUTOMATION_LEVEL !== undefined) fromEnv.defaultAutomationLevel = env.APPLYFLOW_AUTOMATION_LEVEL;
  if (env.APPLYFLOW_TAILORING_MODE !== undefined) fromEnv.defaultTailoringMode = env.APPLYFLOW_TAILORING_MODE;
  if (env.APPLYFLOW_REVIEW_TIMEOUT_HOURS !== undefined) {
    fromEnv.reviewTimeoutMs = Math.round(env.APPLYFLOW_REVIEW_TIMEOUT_HOURS * HOUR_MS);
  }
  return fromEnv;
}

/**
 * Build orchestrator settings: schema defaults, then APPLYFLOW_* env vars,
 * then explicit overrides.
 */
export function loadSettings(overrides: SettingsInput = {}, env: Env = getEnv()): OrchestratorSettings {
  return settingsSchema.parse({ ...settingsFromEnv(env), ...overrides });
}
