import type { Locator } from '../schema/locator.js';
import type { Step, SuiteFile, SuiteTest } from '../schema/suite.js';
import type { Actions } from '../actions/facade.js';
import { createActions } from '../actions/facade.js';
import type { ActionResult } from '../actions/result.js';
import { fail, ok } from '../actions/result.js';
import { AssertionFailed, ElementNotFound } from '../errors.js';
import type { TestUnit } from './testUnit.js';

// ── Step dispatch ────────────────────────────────────────────

export async function executeStep(
  actions: Actions,
  step: Step,
  baseUrl?: string,
): Promise<void> {
  switch (step.type) {
    case 'visit':
      await actions.visit(resolveUrl(step.value, baseUrl));
      break;

    case 'click':
      await actions.click(step.locator);
      break;

    case 'type':
      await actions.type(step.locator, step.value);
      break;

    case 'expect_visible': {
      const { locator } = step;
      const visible = await eventually(actions, step.type, locator, (a) => a.isDisplayed(locator), (v) => v);
      if (!visible) {
        throw new AssertionFailed(`Expected element to be visible: ${step.description}`, step.type, locator);
      }
      break;
    }

    // An absent element counts as hidden.
    case 'expect_hidden': {
      const { locator } = step;
      const visible = await eventually(actions, step.type, locator, (a) => a.isDisplayed(locator), (v) => !v);
      if (visible) {
        throw new AssertionFailed(`Expected element to be hidden: ${step.description}`, step.type, locator);
      }
      break;
    }

    case 'expect_text': {
      const { locator, value } = step;
      const text = await eventually(actions, step.type, locator, (a) => a.text(locator), (t) => t.includes(value));
      if (!text.includes(value)) {
        throw new AssertionFailed(
          `Expected text "${value}" but found "${truncate(text, 80)}"`,
          step.type,
          locator,
        );
      }
      break;
    }
  }
}

// ── Expectation polling ──────────────────────────────────────

/**
 * Re-check an expectation until it holds or the wait budget runs out, and
 * return the last value seen. Each check is a single look through a
 * zero-budget facade; an element that is still absent at the deadline is
 * reported as ElementNotFound.
 */
async function eventually<T>(
  actions: Actions,
  operation: string,
  locator: Locator,
  check: (instant: Actions) => Promise<T>,
  holds: (value: T) => boolean,
): Promise<T> {
  const { timeoutMs, pollIntervalMs } = actions.wait;
  const instant = createActions(actions.session, { timeoutMs: 0, pollIntervalMs });
  const startedAt = Date.now();
  const deadline = startedAt + timeoutMs;

  for (;;) {
    const result = await attempt(() => check(instant));
    if (result.ok && holds(result.value)) return result.value;

    const now = Date.now();
    if (now >= deadline) {
      if (result.ok) return result.value;
      throw new ElementNotFound(locator, operation, now - startedAt);
    }
    await new Promise((r) => setTimeout(r, Math.min(pollIntervalMs, deadline - now)));
  }
}

async function attempt<T>(check: () => Promise<T>): Promise<ActionResult<T>> {
  try {
    return ok(await check());
  } catch (err) {
    if (err instanceof ElementNotFound) return fail(err);
    throw err;
  }
}

// ── Suite → test units ───────────────────────────────────────

export function suiteTestToUnit(test: SuiteTest, baseUrl?: string): TestUnit {
  return {
    id: test.id,
    displayName: test.name ?? test.id,
    async run({ actions }) {
      for (const step of test.steps) {
        await executeStep(actions, step, baseUrl);
      }
    },
  };
}

export function suiteToUnits(suite: SuiteFile): TestUnit[] {
  return suite.tests.map((test) => suiteTestToUnit(test, suite.baseUrl));
}

// ── Helpers ──────────────────────────────────────────────────

export function resolveUrl(value: string, baseUrl?: string): string {
  return baseUrl !== undefined ? new URL(value, baseUrl).toString() : value;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
