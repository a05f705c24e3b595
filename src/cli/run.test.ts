import { describe, expect, it } from 'vitest';

import type { SuiteFile } from '../schema/suite.js';
import { ConfigurationError } from '../errors.js';
import { testConfig } from '../test-utils.js';
import { mergeConfig } from './run.js';

const SUITE: SuiteFile = {
  concurrency: 3,
  seed: 11,
  tests: [{ id: 'a', steps: [{ type: 'visit', description: 'Open', value: '/' }] }],
};

describe('mergeConfig', () => {
  it('lets the suite file override the environment', () => {
    const merged = mergeConfig(testConfig({ concurrency: 2, seed: 5 }), SUITE, {});

    expect(merged.concurrency).toBe(3);
    expect(merged.seed).toBe(11);
  });

  it('lets CLI flags override the suite file', () => {
    const merged = mergeConfig(testConfig(), SUITE, {
      seed: '99',
      concurrency: '4',
      mode: 'REMOTE',
      browser: 'webkit',
      headed: true,
    });

    expect(merged).toMatchObject({
      seed: 99,
      concurrency: 4,
      mode: 'REMOTE',
      browserName: 'webkit',
      headless: false,
    });
  });

  it('keeps the environment when neither suite nor flags say otherwise', () => {
    const env = testConfig({ concurrency: 6, seed: 1 });
    const merged = mergeConfig(env, { tests: SUITE.tests }, {});

    expect(merged).toEqual(env);
    expect(merged).not.toBe(env);
  });

  it('rejects a malformed seed flag instead of falling back', () => {
    expect(() => mergeConfig(testConfig(), SUITE, { seed: '42O' })).toThrow(
      'Invalid seed "42O": expected an integer from 0 to 2147483647',
    );
    expect(() => mergeConfig(testConfig(), SUITE, { seed: '' })).toThrow(ConfigurationError);
  });

  it('rejects a malformed concurrency flag', () => {
    expect(() => mergeConfig(testConfig(), SUITE, { concurrency: 'two' })).toThrow(
      'Invalid concurrency "two": expected a positive integer',
    );
    expect(() => mergeConfig(testConfig(), SUITE, { concurrency: '0' })).toThrow(ConfigurationError);
  });

  it('rejects an unknown browser flag', () => {
    expect(() => mergeConfig(testConfig(), SUITE, { browser: 'lynx' })).toThrow();
  });
});
