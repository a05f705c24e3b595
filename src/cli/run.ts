import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';

import type { AggregateResult, HarnessConfig, SuiteFile } from '../schema/index.js';
import { browserNameSchema, MAX_SEED, parseSeed } from '../schema/index.js';
import { loadHarnessConfig, loadSuiteFile } from '../config/index.js';
import { createHarness, runPlan, shuffle, suiteToUnits } from '../core/index.js';
import { ConfigurationError, RunAborted } from '../errors.js';
import {
  formatReplayHint,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../report/reporter.js';
import * as log from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  PASS: 0,
  FAIL: 1,
  ABORTED: 3,
  ERROR: 4,
} as const;

// ── Option shapes ────────────────────────────────────────────

interface RunOptions {
  seed?: string;
  concurrency?: string;
  mode?: string;
  browser?: string;
  headed?: true;
  test?: string[];
  shuffle: boolean;
  json?: true;
  reportPath: string;
}

// ── Config merge ─────────────────────────────────────────────
// CLI flags override the suite file, which overrides the environment.

export function mergeConfig(
  env: HarnessConfig,
  suite: SuiteFile,
  opts: Pick<RunOptions, 'seed' | 'concurrency' | 'mode' | 'browser' | 'headed'>,
): HarnessConfig {
  const merged: HarnessConfig = { ...env };

  if (opts.mode !== undefined) merged.mode = opts.mode;
  if (opts.browser !== undefined) merged.browserName = browserNameSchema.parse(opts.browser);
  if (opts.headed) merged.headless = false;

  const concurrency =
    opts.concurrency !== undefined ? parseConcurrency(opts.concurrency) : suite.concurrency;
  if (concurrency !== undefined) merged.concurrency = concurrency;

  const seed = opts.seed !== undefined ? parseSeedFlag(opts.seed) : suite.seed;
  if (seed !== undefined) merged.seed = seed;

  return merged;
}

function parseSeedFlag(raw: string): number {
  const seed = parseSeed(raw);
  if (seed === undefined) {
    throw new ConfigurationError(`Invalid seed "${raw}": expected an integer from 0 to ${String(MAX_SEED)}`);
  }
  return seed;
}

function parseConcurrency(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`Invalid concurrency "${raw}": expected a positive integer`);
  }
  return value;
}

function exitCodeFor(result: AggregateResult): number {
  return result.verdict === 'PASS' ? EXIT_CODES.PASS : EXIT_CODES.FAIL;
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(result: AggregateResult, suiteName: string): void {
  process.stderr.write(`\n--- acceptkit Result ---\n`);
  process.stderr.write(`Suite:   ${suiteName}\n`);
  process.stderr.write(`Result:  ${result.verdict}\n`);
  process.stderr.write(
    `Units:   ${String(result.counts.passed)} passed, ${String(result.counts.failed)} failed, ${String(result.counts.errored)} errored\n`,
  );
  process.stderr.write(`Time:    ${(result.durationMs / 1000).toFixed(1)}s\n`);
  process.stderr.write(`Seed:    ${String(result.seed)} (replay with ${formatReplayHint(result.seed)})\n`);
  process.stderr.write(`Run ID:  ${result.runId}\n\n`);
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run every test unit of a suite file concurrently, in seeded order')
    .argument('<suite>', 'Path to a suite file (YAML or JSON)')
    .option('--seed <n>', 'Ordering seed; reuse a reported seed to replay a run')
    .option('--concurrency <n>', 'Maximum sessions open at once')
    .option('--mode <mode>', 'Execution mode: LOCAL or REMOTE')
    .option('--browser <name>', 'chromium, chrome, firefox or webkit')
    .option('--headed', 'Show the browser window (LOCAL only)')
    .option('--test <id>', 'Run only this test unit (repeatable)', collect)
    .option('--no-shuffle', 'Dispatch units in file order')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Artifact directory', '.artifacts')
    .action(async (suitePath: string, opts: RunOptions) => {
      try {
        const suite = await loadSuiteFile(suitePath);
        const config = mergeConfig(loadHarnessConfig(), suite, opts);
        const units = suiteToUnits(suite);
        const unitIds = opts.test ?? units.map((u) => u.id);

        log.section(`Suite ${suite.name ?? path.basename(suitePath)}`);
        log.detail(
          `Mode ${config.mode ?? '(unset)'}, ${config.browserName}${config.headless ? ' headless' : ''}, ` +
            `${String(unitIds.length)} unit(s), concurrency ${String(config.concurrency)}`,
        );
        const harness = createHarness(config);
        const result = await runPlan(
          {
            unitIds,
            concurrencyLimit: config.concurrency,
            seed: config.seed,
            randomize: opts.shuffle,
          },
          units,
          harness,
        );
        const exitCode = exitCodeFor(result);

        const outputDir = path.resolve(opts.reportPath);
        await mkdir(outputDir, { recursive: true });
        const reportPath = path.join(outputDir, 'report.md');
        await writeFile(
          reportPath,
          generateMarkdown(result, `acceptkit Report: ${suite.name ?? path.basename(suitePath)}`),
          'utf-8',
        );
        log.info(`Report written to ${reportPath}`);

        if (opts.json) {
          process.stdout.write(serializeJSON(generateJSON(result, exitCode)) + '\n');
        }

        printSummary(result, suite.name ?? suitePath);
        process.exitCode = exitCode;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        if (err instanceof RunAborted) {
          log.error(message);
          process.exitCode = EXIT_CODES.ABORTED;
          return;
        }
        log.error(`Error: ${message}`);
        process.exitCode = EXIT_CODES.ERROR;
      }
    });
}

// ── Order command ────────────────────────────────────────────

export function registerOrderCommand(program: Command): void {
  program
    .command('order')
    .description('Print the dispatch order a seed produces for a suite, without running it')
    .argument('<suite>', 'Path to a suite file (YAML or JSON)')
    .requiredOption('--seed <n>', 'Ordering seed')
    .action(async (suitePath: string, opts: { seed: string }) => {
      try {
        const seed = parseSeedFlag(opts.seed);
        const suite = await loadSuiteFile(suitePath);
        const order = shuffle(
          suite.tests.map((t) => t.id),
          seed,
        );
        process.stdout.write(order.join('\n') + '\n');
      } catch (err) {
        log.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = EXIT_CODES.ERROR;
      }
    });
}
