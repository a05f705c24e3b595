import { z } from 'zod';

import { failureKindSchema, outcomeStatusSchema, runVerdictSchema } from './outcome.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Unit output ─────────────────────────────────────────────

export const jsonOutputUnitSchema = z.object({
  id: z.string().min(1),
  status: outcomeStatusSchema,
  durationMs: z.number().int().nonnegative(),
  failureKind: failureKindSchema.nullable(),
  reason: z.string(),
});

export type JsonOutputUnit = z.infer<typeof jsonOutputUnitSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  summary: runVerdictSchema,
  runId: z.string().min(1),
  seed: z.number().int().nonnegative(),
  replay: z.string(),
  concurrency: z.number().int().positive(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  dispatchOrder: z.array(z.string()),
  units: z.array(jsonOutputUnitSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
