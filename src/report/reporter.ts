import type { AggregateResult, Outcome, OutcomeStatus } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputUnit } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputUnit };

// ── Replay hint ──────────────────────────────────────────────

export function formatReplayHint(seed: number): string {
  return `--seed=${String(seed)}`;
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: AggregateResult, exitCode: number): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    summary: run.verdict,
    runId: run.runId,
    seed: run.seed,
    replay: formatReplayHint(run.seed),
    concurrency: run.concurrencyLimit,
    durationMs: run.durationMs,
    exitCode,
    dispatchOrder: run.dispatchOrder,
    units: orderByDispatch(run).map(outcomeToJSON),
  };
}

function outcomeToJSON(outcome: Outcome): JsonOutputUnit {
  return {
    id: outcome.unitId,
    status: outcome.status,
    durationMs: outcome.durationMs,
    failureKind: outcome.failure?.kind ?? null,
    reason: outcome.failure?.message ?? '',
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: AggregateResult, title = 'acceptkit Report'): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# ${title}`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Seed** | \`${String(run.seed)}\` (replay with \`${formatReplayHint(run.seed)}\`) |`);
  lines.push(`| **Concurrency** | ${String(run.concurrencyLimit)} |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Result** | **${run.verdict}** ${statusIcon(run.verdict)} |`);
  lines.push(
    `| **Units** | ${String(run.counts.passed)} passed, ${String(run.counts.failed)} failed, ${String(run.counts.errored)} errored |`,
  );
  lines.push('');

  // Unit table, in dispatch order
  lines.push(`## Test Units`);
  lines.push('');
  lines.push(`| # | Unit | Result | Duration | Failure |`);
  lines.push(`|---|------|--------|----------|---------|`);

  orderByDispatch(run).forEach((o, i) => {
    const failure = o.failure ? escapeMarkdownCell(`${o.failure.kind}: ${o.failure.message}`) : '';
    lines.push(
      `| ${String(i + 1)} | ${escapeMarkdownCell(o.unitId)} | ${o.status} ${statusIcon(o.status)} | ${formatDuration(o.durationMs)} | ${failure} |`,
    );
  });
  lines.push('');

  // Failure details
  const failures = run.outcomes.filter((o) => o.failure !== undefined);
  if (failures.length > 0) {
    lines.push(`## Failures`);
    lines.push('');
    for (const o of failures) {
      if (!o.failure) continue;
      lines.push(`### [${o.status}] ${o.unitId}`);
      lines.push('');
      lines.push(`- **Kind:** ${o.failure.kind}`);
      if (o.failure.operation !== undefined) lines.push(`- **Operation:** ${o.failure.operation}`);
      if (o.failure.locator !== undefined) lines.push(`- **Locator:** \`${o.failure.locator}\``);
      lines.push(`- **Message:** ${o.failure.message}`);
      lines.push('');
    }
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function orderByDispatch(run: AggregateResult): Outcome[] {
  const position = new Map(run.dispatchOrder.map((id, i) => [id, i] as const));
  return [...run.outcomes].sort(
    (a, b) => (position.get(a.unitId) ?? Infinity) - (position.get(b.unitId) ?? Infinity),
  );
}

function statusIcon(status: OutcomeStatus): string {
  switch (status) {
    case 'PASS':
      return '[PASS]';
    case 'FAIL':
      return '[FAIL]';
    case 'ERROR':
      return '[ERROR]';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
