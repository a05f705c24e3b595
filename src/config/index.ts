/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and suite files.
 * Zod-validated.
 */

export { TIMEOUTS, LIMITS, ENV_KEYS } from './defaults.js';
export { loadHarnessConfig } from './env.js';
export type { EnvSource } from './env.js';
export { loadSuiteFile, parseSuiteSource } from './loader.js';
