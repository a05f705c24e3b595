/**
 * Driver module.
 * The capability protocol the facade consumes, plus its implementations:
 * Playwright (local launch, remote connect) and in-memory mocks for tests.
 */

export { DriverFailure } from './protocol.js';
export type {
  DriverCapability,
  DriverFailureReason,
  ElementActionArgs,
  ElementActionKind,
  ElementHandle,
  ElementProperty,
  ElementStateValue,
  LocalLauncher,
  RemoteProvider,
  RemoteSession,
} from './protocol.js';
export { resolveSelector } from './selectors.js';
export { PlaywrightDriver, launchLocalDriver, openDriver, browserTypeFor } from './playwright.js';
export type { PlaywrightDriverOptions } from './playwright.js';
export { createHttpProvider } from './provider.js';
export { createMockDriver, createMockProvider, mockElement } from './mock.js';
export type {
  MockDriver,
  MockDriverOptions,
  MockElement,
  MockProvider,
  MockProviderOptions,
} from './mock.js';
