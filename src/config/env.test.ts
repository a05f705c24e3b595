import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { loadHarnessConfig } from './env.js';

describe('loadHarnessConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadHarnessConfig({})).toEqual({
      browserName: 'chromium',
      headless: true,
      waitTimeoutMs: 10_000,
      pollIntervalMs: 250,
      concurrency: 2,
      visibility: 'public',
    });
  });

  it('reads every ACCEPTKIT_ variable', () => {
    const config = loadHarnessConfig({
      ACCEPTKIT_MODE: ' remote ',
      ACCEPTKIT_BROWSER: 'firefox',
      ACCEPTKIT_BROWSER_VERSION: '128',
      ACCEPTKIT_HEADLESS: 'false',
      ACCEPTKIT_WAIT_TIMEOUT_MS: '5000',
      ACCEPTKIT_POLL_INTERVAL_MS: '100',
      ACCEPTKIT_CONCURRENCY: '4',
      ACCEPTKIT_SEED: '7',
      ACCEPTKIT_JOB_VISIBILITY: 'private',
      ACCEPTKIT_REMOTE_WS: 'wss://grid.test/playwright',
      ACCEPTKIT_REMOTE_API: 'https://grid.test/api',
      ACCEPTKIT_REMOTE_KEY: 'test-secret',
    });

    expect(config).toEqual({
      mode: 'remote',
      browserName: 'firefox',
      browserVersion: '128',
      headless: false,
      waitTimeoutMs: 5000,
      pollIntervalMs: 100,
      concurrency: 4,
      seed: 7,
      visibility: 'private',
      remote: {
        wsEndpoint: 'wss://grid.test/playwright',
        apiUrl: 'https://grid.test/api',
        accessKey: 'test-secret',
      },
    });
  });

  it('treats a blank mode as unset', () => {
    expect(loadHarnessConfig({ ACCEPTKIT_MODE: '   ' }).mode).toBeUndefined();
  });

  it('ignores remote settings unless both endpoints are present', () => {
    expect(loadHarnessConfig({ ACCEPTKIT_REMOTE_WS: 'wss://grid.test' }).remote).toBeUndefined();
  });

  it('accepts 1 and yes as true', () => {
    expect(loadHarnessConfig({ ACCEPTKIT_HEADLESS: 'YES' }).headless).toBe(true);
    expect(loadHarnessConfig({ ACCEPTKIT_HEADLESS: '0' }).headless).toBe(false);
  });

  it('rejects a malformed number instead of using the default', () => {
    expect(() => loadHarnessConfig({ ACCEPTKIT_MODE: 'LOCAL', ACCEPTKIT_CONCURRENCY: 'abc' })).toThrow(ZodError);
    expect(() => loadHarnessConfig({ ACCEPTKIT_WAIT_TIMEOUT_MS: '1.5' })).toThrow(ZodError);
  });

  it('rejects a malformed seed instead of generating a new one', () => {
    expect(() => loadHarnessConfig({ ACCEPTKIT_MODE: 'LOCAL', ACCEPTKIT_SEED: '12x' })).toThrow(ZodError);
    expect(() => loadHarnessConfig({ ACCEPTKIT_SEED: '-3' })).toThrow(ZodError);
    expect(() => loadHarnessConfig({ ACCEPTKIT_SEED: '2147483648' })).toThrow(ZodError);
  });

  it('treats a blank seed as unset', () => {
    expect(loadHarnessConfig({ ACCEPTKIT_SEED: ' ' }).seed).toBeUndefined();
  });

  it('rejects an unknown browser', () => {
    expect(() => loadHarnessConfig({ ACCEPTKIT_BROWSER: 'netscape' })).toThrow(ZodError);
  });

  it('rejects a zero concurrency', () => {
    expect(() => loadHarnessConfig({ ACCEPTKIT_CONCURRENCY: '0' })).toThrow(ZodError);
  });
});
