/**
 * Core module: test-unit runner and execution coordinator.
 * Everything the surrounding suite integrates with goes through
 * `runTestUnit` and `runPlan`.
 */

export { runTestUnit, classifyFailure } from './testUnit.js';
export type { TestUnit, TestContext, HarnessContext } from './testUnit.js';
export { runPlan } from './coordinator.js';
export type { RunPlanOptions } from './coordinator.js';
export { createHarness } from './harness.js';
export type { HarnessOptions } from './harness.js';
export { createRng, generateSeed, shuffle } from './ordering.js';
export { executeStep, suiteTestToUnit, suiteToUnits, resolveUrl } from './steps.js';
