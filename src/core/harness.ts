import type { HarnessConfig } from '../schema/config.js';
import type { LocalLauncher, RemoteProvider } from '../driver/protocol.js';
import { launchLocalDriver } from '../driver/playwright.js';
import { createHttpProvider } from '../driver/provider.js';
import { SessionManager } from '../session/manager.js';
import type { OutcomeHook } from '../session/manager.js';
import type { HarnessContext } from './testUnit.js';

export interface HarnessOptions {
  launchLocal?: LocalLauncher;
  provider?: RemoteProvider;
  onOutcome?: OutcomeHook;
}

/**
 * Wire config to a session manager. Playwright launches local browsers;
 * the HTTP provider is used for REMOTE when remote settings are present.
 */
export function createHarness(config: HarnessConfig, options: HarnessOptions = {}): HarnessContext {
  const provider =
    options.provider ?? (config.remote !== undefined ? createHttpProvider(config.remote) : undefined);

  return {
    config,
    sessions: new SessionManager({
      launchLocal: options.launchLocal ?? launchLocalDriver,
      provider,
      onOutcome: options.onOutcome,
    }),
  };
}
