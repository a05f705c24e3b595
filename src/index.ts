/**
 * acceptkit: browser acceptance-test harness.
 *
 * Page objects compose `Actions`; tests run through `runTestUnit`;
 * suites run through `runPlan`.
 */

export * from './schema/index.js';
export * from './errors.js';
export * from './config/index.js';
export * from './driver/index.js';
export * from './actions/index.js';
export * from './session/index.js';
export * from './core/index.js';
export { generateMarkdown, generateJSON, serializeJSON, formatReplayHint } from './report/index.js';
export { mergeConfig, EXIT_CODES } from './cli/index.js';
