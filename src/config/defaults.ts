/**
 * Default configuration values.
 * All values are overridable via environment, suite file or CLI flag.
 */

export const TIMEOUTS = {
  /** Explicit-wait budget for element resolution. */
  WAIT_BUDGET: 10_000,
  POLL_INTERVAL: 250,
  NAVIGATION_TIMEOUT: 30_000,
  ACTION_TIMEOUT: 5_000,
  PROVIDER_REQUEST_TIMEOUT: 15_000,
} as const;

export const LIMITS = {
  CONCURRENCY: 2,
} as const;

export const ENV_KEYS = {
  MODE: 'ACCEPTKIT_MODE',
  BROWSER: 'ACCEPTKIT_BROWSER',
  BROWSER_VERSION: 'ACCEPTKIT_BROWSER_VERSION',
  HEADLESS: 'ACCEPTKIT_HEADLESS',
  WAIT_TIMEOUT_MS: 'ACCEPTKIT_WAIT_TIMEOUT_MS',
  POLL_INTERVAL_MS: 'ACCEPTKIT_POLL_INTERVAL_MS',
  CONCURRENCY: 'ACCEPTKIT_CONCURRENCY',
  SEED: 'ACCEPTKIT_SEED',
  JOB_VISIBILITY: 'ACCEPTKIT_JOB_VISIBILITY',
  REMOTE_WS: 'ACCEPTKIT_REMOTE_WS',
  REMOTE_API: 'ACCEPTKIT_REMOTE_API',
  REMOTE_KEY: 'ACCEPTKIT_REMOTE_KEY',
} as const;
