/**
 * Report generation module.
 * Transforms an aggregate run result into markdown + JSON artifacts.
 */

export { generateMarkdown, generateJSON, serializeJSON, formatReplayHint } from './reporter.js';
export type { JsonOutput, JsonOutputUnit } from './reporter.js';
