import { describe, expect, it } from 'vitest';

import { PROVIDER_OPTIONS_KEY } from '../schema/session.js';
import { ConfigurationError } from '../errors.js';
import { testConfig } from '../test-utils.js';
import { buildCapabilityEnvelope, createSessionDescriptor, parseExecutionMode } from './descriptor.js';

describe('parseExecutionMode', () => {
  it('accepts LOCAL and REMOTE in any case', () => {
    expect(parseExecutionMode('LOCAL')).toBe('LOCAL');
    expect(parseExecutionMode('local')).toBe('LOCAL');
    expect(parseExecutionMode(' Remote ')).toBe('REMOTE');
  });

  it('rejects an unset mode', () => {
    expect(() => parseExecutionMode(undefined)).toThrow(ConfigurationError);
    expect(() => parseExecutionMode('  ')).toThrow(
      'No execution mode set: export ACCEPTKIT_MODE=LOCAL or ACCEPTKIT_MODE=REMOTE',
    );
  });

  it('rejects an unknown mode', () => {
    expect(() => parseExecutionMode('cloud')).toThrow(
      'Unrecognized execution mode "cloud": expected LOCAL or REMOTE',
    );
  });
});

describe('createSessionDescriptor', () => {
  it('builds a frozen descriptor from the config', () => {
    const descriptor = createSessionDescriptor(
      testConfig({ mode: 'local', browserName: 'webkit', visibility: 'private' }),
      { displayName: 'search', args: ['--mute-audio'] },
    );

    expect(descriptor).toEqual({
      mode: 'LOCAL',
      capabilities: {
        browserName: 'webkit',
        headless: true,
        args: ['--mute-audio'],
        extensions: {},
      },
      displayName: 'search',
      visibility: 'private',
    });
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.capabilities)).toBe(true);
    expect(Object.isFrozen(descriptor.capabilities.args)).toBe(true);
  });

  it('throws before anything else when the mode is unset', () => {
    expect(() =>
      createSessionDescriptor(testConfig({ mode: undefined }), { displayName: 'search' }),
    ).toThrow(ConfigurationError);
  });
});

describe('buildCapabilityEnvelope', () => {
  it('puts the job name and visibility under the provider options key', () => {
    const descriptor = createSessionDescriptor(testConfig({ mode: 'REMOTE' }), {
      displayName: 'Guest checkout',
    });

    const envelope = buildCapabilityEnvelope(descriptor);

    expect(envelope[PROVIDER_OPTIONS_KEY]).toEqual({ name: 'Guest checkout', visibility: 'public' });
    expect(envelope).not.toHaveProperty('browserVersion');
  });

  it('does not let extensions override the job name', () => {
    const descriptor = createSessionDescriptor(testConfig({ mode: 'REMOTE' }), {
      displayName: 'Guest checkout',
      extensions: { name: 'other', tunnel: 'ci-42' },
    });

    expect(buildCapabilityEnvelope(descriptor)[PROVIDER_OPTIONS_KEY]).toEqual({
      name: 'Guest checkout',
      visibility: 'public',
      tunnel: 'ci-42',
    });
  });
});
