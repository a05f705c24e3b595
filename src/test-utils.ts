import type { HarnessConfig } from './schema/config.js';
import type { Outcome } from './schema/outcome.js';
import type { DriverCapability } from './driver/protocol.js';
import { createSessionDescriptor } from './session/descriptor.js';
import { SessionManager } from './session/manager.js';
import type { SessionHandle } from './session/handle.js';

export function testConfig(overrides: Partial<HarnessConfig> = {}): HarnessConfig {
  return {
    mode: 'LOCAL',
    browserName: 'chromium',
    headless: true,
    waitTimeoutMs: 1000,
    pollIntervalMs: 250,
    concurrency: 2,
    visibility: 'public',
    ...overrides,
  };
}

export function passOutcome(unitId: string): Outcome {
  return { unitId, status: 'PASS', durationMs: 0 };
}

export function failOutcome(unitId: string): Outcome {
  return {
    unitId,
    status: 'FAIL',
    durationMs: 0,
    failure: { kind: 'AssertionFailed', message: 'expected true' },
  };
}

/** A LOCAL session on the given driver, owned by `ownerId`. */
export async function startLocalSession(
  driver: DriverCapability,
  ownerId = 'unit-1',
): Promise<{ manager: SessionManager; handle: SessionHandle }> {
  const manager = new SessionManager({ launchLocal: async () => driver });
  const descriptor = createSessionDescriptor(testConfig(), { displayName: ownerId });
  const handle = await manager.start(descriptor, ownerId);
  return { manager, handle };
}
