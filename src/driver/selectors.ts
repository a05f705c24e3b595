import type { Locator as PlaywrightLocator, Page } from 'playwright';

import type { Locator } from '../schema/locator.js';

// ── Resolver ──────────────────────────────────────────────────

/**
 * Maps a Locator to a Playwright locator.
 *
 *   id     → page.locator('[id="value"]')
 *   testid → page.getByTestId(value)
 *   role   → page.getByRole(role, { name })
 *   text   → page.getByText(value)
 *   xpath  → page.locator('xpath=value')
 *   css    → page.locator(value)
 */
export function resolveSelector(page: Page, locator: Locator): PlaywrightLocator {
  switch (locator.strategy) {
    case 'id':
      return page.locator(`[id="${locator.value.replace(/"/g, '\\"')}"]`);

    case 'testid':
      return page.getByTestId(locator.value);

    case 'role':
      return resolveRole(page, locator);

    case 'text':
      return page.getByText(locator.value);

    case 'xpath':
      return page.locator(`xpath=${locator.value}`);

    case 'css':
      return page.locator(locator.value);
  }
}

function resolveRole(page: Page, locator: Locator): PlaywrightLocator {
  const role = locator.role ?? locator.value;

  // Playwright accepts the ARIA role as a plain string at runtime.
  // The TypeScript overload expects a union literal, so we cast once here.
  const ariaRole = role as Parameters<Page['getByRole']>[0];

  return locator.name !== undefined
    ? page.getByRole(ariaRole, { name: locator.name })
    : page.getByRole(ariaRole);
}
