import { randomUUID } from 'node:crypto';

import { ZodError } from 'zod';

import { computeRunVerdict, countOutcomes } from '../schema/outcome.js';
import type { AggregateResult, Outcome } from '../schema/outcome.js';
import { parseExecutionPlan } from '../schema/plan.js';
import type { ExecutionPlan, ExecutionPlanInput } from '../schema/plan.js';
import { parseExecutionMode } from '../session/descriptor.js';
import { ConfigurationError, RunAborted } from '../errors.js';
import * as log from '../utils/logger.js';
import { generateSeed, shuffle } from './ordering.js';
import { runTestUnit } from './testUnit.js';
import type { HarnessContext, TestUnit } from './testUnit.js';

// ── Public types ─────────────────────────────────────────────

export interface RunPlanOptions {
  /** Called as each unit is handed to a worker, in dispatch order. */
  onDispatch?: (unitId: string, index: number, total: number) => void;
  /** Called as each unit finishes, in completion order. */
  onOutcome?: (outcome: Outcome) => void;
}

// ── Plan validation ──────────────────────────────────────────

function validatePlan(
  input: ExecutionPlanInput,
  units: ReadonlyMap<string, TestUnit>,
  harness: HarnessContext,
): ExecutionPlan {
  let plan: ExecutionPlan;
  try {
    plan = parseExecutionPlan(input);
  } catch (err) {
    const reason =
      err instanceof ZodError
        ? err.issues.map((i) => `${i.path.join('.') || 'plan'}: ${i.message}`).join('; ')
        : String(err);
    throw new RunAborted(`invalid execution plan (${reason})`, err);
  }

  const unknown = plan.unitIds.filter((id) => !units.has(id));
  if (unknown.length > 0) {
    throw new RunAborted(`unknown test unit(s): ${unknown.join(', ')}`);
  }

  try {
    parseExecutionMode(harness.config.mode);
  } catch (err) {
    if (err instanceof ConfigurationError) throw new RunAborted(err.message, err);
    throw err;
  }

  return plan;
}

// ── Coordinator ──────────────────────────────────────────────

/**
 * Run every unit of the plan with at most `concurrencyLimit` sessions open.
 *
 * Units are ordered by the plan's seed (a fresh one is generated and
 * reported when absent) and pulled by a fixed pool of workers. A worker
 * takes its next unit only after the previous unit's teardown completed.
 * Unit failures become Outcomes; only coordinator faults throw `RunAborted`.
 */
export async function runPlan(
  input: ExecutionPlanInput,
  registry: readonly TestUnit[],
  harness: HarnessContext,
  options: RunPlanOptions = {},
): Promise<AggregateResult> {
  const units = new Map(registry.map((u) => [u.id, u] as const));
  const plan = validatePlan(input, units, harness);

  const generated = plan.seed === undefined;
  const seed = plan.seed ?? generateSeed();
  log.seed(seed, generated);

  const order = plan.randomize ? shuffle(plan.unitIds, seed) : [...plan.unitIds];
  const workerCount = Math.min(plan.concurrencyLimit, order.length);

  const startedAt = new Date();
  const dispatchOrder: string[] = [];
  const outcomes: Outcome[] = [];
  let cursor = 0;

  async function worker(): Promise<void> {
    for (;;) {
      const index = cursor++;
      const unitId = order[index];
      if (unitId === undefined) return;
      const unit = units.get(unitId);
      if (!unit) throw new RunAborted(`test unit ${unitId} disappeared from the registry`);

      dispatchOrder.push(unit.id);
      log.dispatch(index, order.length, unit.id);
      options.onDispatch?.(unit.id, index, order.length);

      const outcome = await runTestUnit(unit, harness);
      outcomes.push(outcome);
      log.unitResult(outcome);
      options.onOutcome?.(outcome);
    }
  }

  const settled = await Promise.allSettled(
    Array.from({ length: workerCount }, () => worker()),
  );
  const crashed = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
  if (crashed) {
    throw new RunAborted(`worker crashed: ${String(crashed.reason)}`, crashed.reason);
  }

  const finishedAt = new Date();
  return {
    runId: randomUUID(),
    seed,
    concurrencyLimit: plan.concurrencyLimit,
    verdict: computeRunVerdict(outcomes),
    dispatchOrder,
    outcomes,
    counts: countOutcomes(outcomes),
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
  };
}
