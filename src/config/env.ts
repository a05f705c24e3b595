import { harnessConfigSchema } from '../schema/config.js';
import type { HarnessConfig } from '../schema/config.js';
import { ENV_KEYS, LIMITS, TIMEOUTS } from './defaults.js';

export type EnvSource = Readonly<Record<string, string | undefined>>;

// ── Env loader ───────────────────────────────────────────────

/**
 * Build the harness config from environment variables.
 * Throws a ZodError when a present value is malformed.
 */
export function loadHarnessConfig(env: EnvSource = process.env): HarnessConfig {
  const wsEndpoint = env[ENV_KEYS.REMOTE_WS];
  const apiUrl = env[ENV_KEYS.REMOTE_API];

  return harnessConfigSchema.parse({
    mode: blankToUndefined(env[ENV_KEYS.MODE]),
    browserName: env[ENV_KEYS.BROWSER] ?? 'chromium',
    browserVersion: blankToUndefined(env[ENV_KEYS.BROWSER_VERSION]),
    headless: parseBoolean(env[ENV_KEYS.HEADLESS], true),
    waitTimeoutMs: parseInteger(env[ENV_KEYS.WAIT_TIMEOUT_MS], TIMEOUTS.WAIT_BUDGET),
    pollIntervalMs: parseInteger(env[ENV_KEYS.POLL_INTERVAL_MS], TIMEOUTS.POLL_INTERVAL),
    concurrency: parseInteger(env[ENV_KEYS.CONCURRENCY], LIMITS.CONCURRENCY),
    seed: parseNumber(env[ENV_KEYS.SEED]),
    visibility: env[ENV_KEYS.JOB_VISIBILITY] ?? 'public',
    remote:
      wsEndpoint !== undefined && apiUrl !== undefined
        ? { wsEndpoint, apiUrl, accessKey: blankToUndefined(env[ENV_KEYS.REMOTE_KEY]) }
        : undefined,
  });
}

// ── Helpers ──────────────────────────────────────────────────

function blankToUndefined(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  const raw = blankToUndefined(value)?.toLowerCase();
  if (raw === undefined) return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes';
}

// Malformed numbers become NaN so the schema rejects them.
function parseNumber(value: string | undefined): number | undefined {
  const raw = blankToUndefined(value);
  return raw === undefined ? undefined : Number(raw);
}

function parseInteger(value: string | undefined, fallback: number): number {
  return parseNumber(value) ?? fallback;
}
