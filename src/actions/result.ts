import type { ElementNotFound, ElementNotInteractable } from '../errors.js';

// ── ActionResult ─────────────────────────────────────────────
// Classified element failures travel as values inside the facade and are
// only thrown at its public boundary. Unclassified driver errors are never
// wrapped here; they reject the call as they are.

export type ClassifiedFailure = ElementNotFound | ElementNotInteractable;

export type ActionResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ClassifiedFailure };

export function ok<T>(value: T): ActionResult<T> {
  return { ok: true, value };
}

export function fail(error: ClassifiedFailure): { ok: false; error: ClassifiedFailure } {
  return { ok: false, error };
}

export function unwrap<T>(result: ActionResult<T>): T {
  if (result.ok) return result.value;
  throw result.error;
}
