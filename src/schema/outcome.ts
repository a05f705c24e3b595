import { z } from 'zod';

// ── Failure detail ────────────────────────────────────────────

export const failureKindSchema = z.enum([
  'ElementNotFound',
  'ElementNotInteractable',
  'NavigationError',
  'SessionClosed',
  'ProviderError',
  'ConfigurationError',
  'SessionConflict',
  'RunAborted',
  'AssertionFailed',
  'UnexpectedError',
]);

export type FailureKind = z.infer<typeof failureKindSchema>;

export const failureDetailSchema = z.object({
  kind: failureKindSchema,
  message: z.string(),
  operation: z.string().optional(),
  locator: z.string().optional(),
});

export type FailureDetail = z.infer<typeof failureDetailSchema>;

// ── Outcome ───────────────────────────────────────────────────

export const outcomeStatusSchema = z.enum(['PASS', 'FAIL', 'ERROR']);

export type OutcomeStatus = z.infer<typeof outcomeStatusSchema>;

export const outcomeSchema = z.object({
  unitId: z.string().min(1),
  status: outcomeStatusSchema,
  failure: failureDetailSchema.optional(),
  durationMs: z.number().int().nonnegative(),
  sessionId: z.string().optional(),
});

export type Outcome = z.infer<typeof outcomeSchema>;

// ── AggregateResult ───────────────────────────────────────────

export const runVerdictSchema = z.enum(['PASS', 'FAIL']);

export type RunVerdict = z.infer<typeof runVerdictSchema>;

export const outcomeCountsSchema = z.object({
  total: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  errored: z.number().int().nonnegative(),
});

export type OutcomeCounts = z.infer<typeof outcomeCountsSchema>;

export const aggregateResultSchema = z.object({
  runId: z.string().min(1),
  seed: z.number().int().nonnegative(),
  concurrencyLimit: z.number().int().positive(),
  verdict: runVerdictSchema,
  dispatchOrder: z.array(z.string()),
  outcomes: z.array(outcomeSchema),
  counts: outcomeCountsSchema,
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type AggregateResult = z.infer<typeof aggregateResultSchema>;

// ── Deterministic verdict ─────────────────────────────────────
// Any FAIL or ERROR fails the run.

export function computeRunVerdict(outcomes: readonly Outcome[]): RunVerdict {
  return outcomes.every((o) => o.status === 'PASS') ? 'PASS' : 'FAIL';
}

export function countOutcomes(outcomes: readonly Outcome[]): OutcomeCounts {
  const counts: OutcomeCounts = { total: outcomes.length, passed: 0, failed: 0, errored: 0 };
  for (const o of outcomes) {
    switch (o.status) {
      case 'PASS':
        counts.passed++;
        break;
      case 'FAIL':
        counts.failed++;
        break;
      case 'ERROR':
        counts.errored++;
        break;
    }
  }
  return counts;
}
