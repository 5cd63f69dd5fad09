import { z } from 'zod';

export const StageFailurePolicySchema = z.enum(['halt', 'continue']);

export const ItemFailurePolicySchema = z.enum(['STOP', 'CONTINUE']);

export const RunnerSettingsSchema = z.object({
  maxExtraAttempts: z.number().int().min(0).default(0),
  backoffMs: z.number().int().min(0).default(0),
  onFailure: StageFailurePolicySchema.default('halt'),
});

export const BatchOptionsSchema = z.object({
  maxParallel: z.number().int().min(1).default(4),
  onItemFailure: ItemFailurePolicySchema.default('CONTINUE'),
  perItemTimeoutMs: z.number().int().positive().default(10 * 60 * 1000),
});

// YAML uses snake_case and lower-case policy names.
export const EngineConfigSchema = z.object({
  log_level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  runner: z
    .object({
      max_extra_attempts: z.number().int().min(0).optional(),
      backoff_ms: z.number().int().min(0).optional(),
      on_failure: StageFailurePolicySchema.optional(),
    })
    .strict()
    .default({}),
  batch: z
    .object({
      max_parallel: z.number().int().min(1).optional(),
      on_item_failure: z.enum(['stop', 'continue']).optional(),
      per_item_timeout_ms: z.number().int().positive().optional(),
    })
    .strict()
    .default({}),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
}
