import type { Locator } from '../schema/locator.js';
import type {
  DriverCapability,
  ElementHandle,
  ElementProperty,
  ElementStateValue,
} from '../driver/protocol.js';
import { DriverFailure } from '../driver/protocol.js';
import type { SessionHandle } from '../session/handle.js';
import {
  ElementNotFound,
  ElementNotInteractable,
  NavigationError,
  SessionClosed,
} from '../errors.js';
import { TIMEOUTS } from '../config/defaults.js';
import type { ActionResult } from './result.js';
import { fail, ok, unwrap } from './result.js';

// ── Public types ─────────────────────────────────────────────

export interface WaitOptions {
  /** Explicit-wait budget for every element resolution. */
  timeoutMs: number;
  /** Delay between resolution attempts. */
  pollIntervalMs: number;
}

export const DEFAULT_WAIT: WaitOptions = {
  timeoutMs: TIMEOUTS.WAIT_BUDGET,
  pollIntervalMs: TIMEOUTS.POLL_INTERVAL,
};

/**
 * Driver-agnostic operations page objects compose. Every element operation
 * waits up to the configured budget for its locator to resolve.
 */
export interface Actions {
  readonly session: SessionHandle;
  readonly wait: WaitOptions;
  visit(url: string): Promise<void>;
  find(locator: Locator): Promise<ElementHandle>;
  click(locator: Locator): Promise<void>;
  type(locator: Locator, text: string): Promise<void>;
  read(locator: Locator, property: ElementProperty): Promise<ElementStateValue>;
  text(locator: Locator): Promise<string>;
  /** False when nothing matches within the budget; every other failure propagates. */
  isDisplayed(locator: Locator): Promise<boolean>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

// ── Facade ───────────────────────────────────────────────────

export function createActions(session: SessionHandle, wait: WaitOptions = DEFAULT_WAIT): Actions {
  /**
   * Explicit wait: locate until something matches or the deadline passes.
   * The last attempt lands on the deadline itself, so absence is reported
   * once the full budget has elapsed and not before.
   */
  async function resolve(
    locator: Locator,
    operation: string,
    startedAt: number,
    deadline: number,
  ): Promise<ActionResult<ElementHandle>> {
    for (;;) {
      const matches = await session.request(operation, (d) => d.locate(locator), locator);
      const first = matches[0];
      if (first) return ok(first);

      const now = Date.now();
      if (now >= deadline) {
        return fail(new ElementNotFound(locator, operation, now - startedAt));
      }
      await sleep(Math.min(wait.pollIntervalMs, deadline - now));
    }
  }

  /** Resolve, then use the element; a stale element is re-resolved within the same budget. */
  async function withElement<T>(
    locator: Locator,
    operation: string,
    use: (driver: DriverCapability, element: ElementHandle) => Promise<T>,
  ): Promise<ActionResult<T>> {
    const startedAt = Date.now();
    const deadline = startedAt + wait.timeoutMs;

    for (;;) {
      const found = await resolve(locator, operation, startedAt, deadline);
      if (!found.ok) return found;
      const element = found.value;

      try {
        return ok(await session.request(operation, (d) => use(d, element), locator));
      } catch (err) {
        if (!(err instanceof DriverFailure)) throw err;

        if (err.reason === 'not-interactable') {
          return fail(new ElementNotInteractable(locator, operation, err));
        }
        const now = Date.now();
        if (now >= deadline) {
          return fail(new ElementNotFound(locator, operation, now - startedAt));
        }
      }
    }
  }

  async function read(locator: Locator, property: ElementProperty): Promise<ElementStateValue> {
    return unwrap(
      await withElement(locator, `read ${property}`, (d, el) => d.elementState(el, property)),
    );
  }

  return {
    session,
    wait,

    async visit(url: string): Promise<void> {
      try {
        await session.request('visit', (d) => d.navigate(url));
      } catch (err) {
        if (err instanceof SessionClosed) throw err;
        throw new NavigationError(url, err);
      }
    },

    async find(locator: Locator): Promise<ElementHandle> {
      const startedAt = Date.now();
      return unwrap(await resolve(locator, 'find', startedAt, startedAt + wait.timeoutMs));
    },

    async click(locator: Locator): Promise<void> {
      unwrap(await withElement(locator, 'click', (d, el) => d.elementAction(el, 'click')));
    },

    async type(locator: Locator, text: string): Promise<void> {
      unwrap(
        await withElement(locator, 'type', async (d, el) => {
          await d.elementAction(el, 'clear');
          await d.elementAction(el, 'type', { text });
        }),
      );
    },

    read,

    async text(locator: Locator): Promise<string> {
      const value = await read(locator, 'text');
      return typeof value === 'string' ? value : String(value);
    },

    async isDisplayed(locator: Locator): Promise<boolean> {
      const result = await withElement(locator, 'isDisplayed', (d, el) =>
        d.elementState(el, 'displayed'),
      );
      if (!result.ok) {
        if (result.error.kind === 'ElementNotFound') return false;
        throw result.error;
      }
      return result.value === true;
    },
  };
}
