import { z } from 'zod';

// ── ExecutionPlan ─────────────────────────────────────────────

export const MAX_SEED = 0x7fffffff;

export const seedSchema = z.number().int().min(0).max(MAX_SEED);

export const executionPlanSchema = z.object({
  unitIds: z
    .array(z.string().min(1))
    .min(1)
    .refine((ids) => new Set(ids).size === ids.length, {
      message: 'unit ids must be unique',
    }),
  concurrencyLimit: z.number().int().positive(),
  seed: seedSchema.optional(),
  randomize: z.boolean().optional().default(true),
});

export type ExecutionPlanInput = z.input<typeof executionPlanSchema>;
export type ExecutionPlan = z.infer<typeof executionPlanSchema>;

export function parseExecutionPlan(data: unknown): ExecutionPlan {
  return executionPlanSchema.parse(data);
}

/** Parses a `--seed` style value. Returns undefined for anything that is not a valid seed. */
export function parseSeed(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const result = seedSchema.safeParse(Number(raw));
  return result.success ? result.data : undefined;
}
