import { chromium, errors, firefox, webkit } from 'playwright';
import type {
  Browser,
  BrowserType,
  Locator as PlaywrightLocator,
  Page,
} from 'playwright';

import type { Locator } from '../schema/locator.js';
import { describeLocator } from '../schema/locator.js';
import type { BrowserName, CapabilityOptions } from '../schema/session.js';
import { TIMEOUTS } from '../config/defaults.js';
import { resolveSelector } from './selectors.js';
import { DriverFailure } from './protocol.js';
import type {
  DriverCapability,
  ElementActionArgs,
  ElementActionKind,
  ElementHandle,
  ElementProperty,
  ElementStateValue,
} from './protocol.js';

// ── Element handle ───────────────────────────────────────────

class PlaywrightElement implements ElementHandle {
  constructor(
    readonly description: string,
    readonly element: PlaywrightLocator,
  ) {}
}

function unwrap(handle: ElementHandle): PlaywrightElement {
  if (!(handle instanceof PlaywrightElement)) {
    throw new Error(`Element handle ${handle.description} does not belong to a Playwright driver`);
  }
  return handle;
}

// ── Error classification ─────────────────────────────────────

const DETACHED_PATTERN = /not attached to the DOM|Element is detached|has been disposed/i;
const NOT_INTERACTABLE_PATTERN =
  /Element is not an <input>|Not a checkbox or radio button|Element is not editable|not an HTMLElement/i;

/**
 * Map a Playwright error onto the driver failure kinds. A timeout on an
 * element that no longer matches anything is stale, so the caller re-resolves.
 */
export function classifyActionError(
  err: unknown,
  description: string,
  detached = false,
): unknown {
  if (err instanceof errors.TimeoutError) {
    return detached
      ? new DriverFailure('stale', `${description} was detached`, err)
      : new DriverFailure('not-interactable', `${description} did not become actionable`, err);
  }
  if (!(err instanceof Error)) return err;
  if (DETACHED_PATTERN.test(err.message)) {
    return new DriverFailure('stale', `${description} was detached`, err);
  }
  if (NOT_INTERACTABLE_PATTERN.test(err.message)) {
    return new DriverFailure('not-interactable', `${description} cannot take this action`, err);
  }
  return err;
}

async function toDriverError(
  err: unknown,
  element: PlaywrightLocator,
  description: string,
): Promise<unknown> {
  const detached = err instanceof errors.TimeoutError && (await element.count()) === 0;
  return classifyActionError(err, description, detached);
}

// ── Driver ───────────────────────────────────────────────────

export interface PlaywrightDriverOptions {
  navigationTimeout?: number;
  actionTimeout?: number;
}

/**
 * DriverCapability over one Playwright page. The browser is owned by the
 * driver: closing the session closes the browser (or the remote connection).
 */
export class PlaywrightDriver implements DriverCapability {
  private readonly navigationTimeout: number;
  private readonly actionTimeout: number;

  constructor(
    private readonly browser: Browser,
    readonly page: Page,
    options: PlaywrightDriverOptions = {},
  ) {
    this.navigationTimeout = options.navigationTimeout ?? TIMEOUTS.NAVIGATION_TIMEOUT;
    this.actionTimeout = options.actionTimeout ?? TIMEOUTS.ACTION_TIMEOUT;
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, {
      timeout: this.navigationTimeout,
      waitUntil: 'domcontentloaded',
    });
  }

  async locate(locator: Locator): Promise<ElementHandle[]> {
    const description = describeLocator(locator);
    const matches = resolveSelector(this.page, locator);
    const count = await matches.count();
    return Array.from(
      { length: count },
      (_, i) => new PlaywrightElement(`${description}[${String(i)}]`, matches.nth(i)),
    );
  }

  async elementAction(
    handle: ElementHandle,
    kind: ElementActionKind,
    args: ElementActionArgs = {},
  ): Promise<void> {
    const { element, description } = unwrap(handle);
    try {
      switch (kind) {
        case 'click':
          await element.click({ timeout: this.actionTimeout });
          break;
        case 'type':
          await element.fill(args.text ?? '', { timeout: this.actionTimeout });
          break;
        case 'clear':
          await element.fill('', { timeout: this.actionTimeout });
          break;
      }
    } catch (err) {
      throw await toDriverError(err, element, description);
    }
  }

  async elementState(
    handle: ElementHandle,
    property: ElementProperty,
  ): Promise<ElementStateValue> {
    const { element, description } = unwrap(handle);
    const timeout = this.actionTimeout;
    try {
      switch (property) {
        case 'displayed':
          return await element.isVisible();
        case 'enabled':
          return await element.isEnabled({ timeout });
        case 'selected':
          return await element.isChecked({ timeout });
        case 'text':
          return await element.innerText({ timeout });
        case 'value':
          return await element.inputValue({ timeout });
      }
    } catch (err) {
      throw await toDriverError(err, element, description);
    }
  }

  async closeSession(): Promise<void> {
    await this.browser.close();
  }
}

// ── Launchers ────────────────────────────────────────────────

export function browserTypeFor(name: BrowserName): BrowserType {
  switch (name) {
    case 'chromium':
    case 'chrome':
      return chromium;
    case 'firefox':
      return firefox;
    case 'webkit':
      return webkit;
  }
}

/** Launch a local browser process and open one page on it. */
export async function launchLocalDriver(
  capabilities: CapabilityOptions,
): Promise<DriverCapability> {
  const browser = await browserTypeFor(capabilities.browserName).launch({
    headless: capabilities.headless,
    args: [...capabilities.args],
    ...(capabilities.browserName === 'chrome' ? { channel: 'chrome' } : {}),
  });
  return openDriver(browser);
}

/** Wrap an already connected browser (local or remote) in a driver. */
export async function openDriver(browser: Browser): Promise<PlaywrightDriver> {
  try {
    const context = await browser.newContext();
    const page = await context.newPage();
    return new PlaywrightDriver(browser, page);
  } catch (err) {
    await browser.close();
    throw err;
  }
}
