/**
 * Action facade module.
 * The only surface page objects use to drive a browser.
 */

export { createActions, DEFAULT_WAIT } from './facade.js';
export type { Actions, WaitOptions } from './facade.js';
export { ok, fail, unwrap } from './result.js';
export type { ActionResult, ClassifiedFailure } from './result.js';
