import { z } from 'zod';

// ── Locator ───────────────────────────────────────────────────

export const locatorStrategySchema = z.enum([
  'id',
  'css',
  'xpath',
  'testid',
  'text',
  'role',
]);

export type LocatorStrategy = z.infer<typeof locatorStrategySchema>;

export const locatorSchema = z
  .object({
    strategy: locatorStrategySchema,
    value: z.string().min(1),
    role: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
  })
  .readonly();

export type Locator = z.infer<typeof locatorSchema>;

// ── Constructors ──────────────────────────────────────────────
// Page objects declare their locators once through these.

export const by = {
  id: (value: string): Locator => freeze({ strategy: 'id', value }),
  css: (value: string): Locator => freeze({ strategy: 'css', value }),
  xpath: (value: string): Locator => freeze({ strategy: 'xpath', value }),
  testId: (value: string): Locator => freeze({ strategy: 'testid', value }),
  text: (value: string): Locator => freeze({ strategy: 'text', value }),
  role: (role: string, name?: string): Locator =>
    freeze(
      name !== undefined
        ? { strategy: 'role', value: role, role, name }
        : { strategy: 'role', value: role, role },
    ),
} as const;

function freeze(locator: Locator): Locator {
  return Object.freeze({ ...locator });
}

export function parseLocator(data: unknown): Locator {
  return freeze(locatorSchema.parse(data));
}

// ── Equality ──────────────────────────────────────────────────

export function locatorsEqual(a: Locator, b: Locator): boolean {
  return (
    a.strategy === b.strategy &&
    a.value === b.value &&
    a.role === b.role &&
    a.name === b.name
  );
}

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner describing the locator for errors and reports. */
export function describeLocator(locator: Locator): string {
  switch (locator.strategy) {
    case 'id':
      return `#${locator.value}`;
    case 'testid':
      return `[data-testid="${locator.value}"]`;
    case 'role': {
      const role = locator.role ?? locator.value;
      return locator.name !== undefined
        ? `role=${role}[name="${locator.name}"]`
        : `role=${role}`;
    }
    case 'text':
      return `text="${locator.value}"`;
    case 'xpath':
      return `xpath=${locator.value}`;
    case 'css':
      return locator.value;
  }
}
