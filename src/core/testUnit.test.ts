import { AssertionError } from 'node:assert';

import { describe, expect, it } from 'vitest';

import { by } from '../schema/locator.js';
import { createMockDriver, createMockProvider, mockElement } from '../driver/mock.js';
import { SessionManager } from '../session/manager.js';
import {
  AssertionFailed,
  ConfigurationError,
  ElementNotFound,
  ElementNotInteractable,
  NavigationError,
  ProviderError,
} from '../errors.js';
import { testConfig } from '../test-utils.js';
import { classifyFailure, runTestUnit } from './testUnit.js';
import type { TestUnit } from './testUnit.js';

describe('classifyFailure', () => {
  it('treats application misbehaviour as FAIL', () => {
    expect(classifyFailure(new AssertionFailed('wrong total', 'expect_text'))).toBe('FAIL');
    expect(classifyFailure(new AssertionError({ message: 'expected 2' }))).toBe('FAIL');
    expect(classifyFailure(new ElementNotFound(by.id('x'), 'click', 1000))).toBe('FAIL');
    expect(classifyFailure(new ElementNotInteractable(by.id('x'), 'click'))).toBe('FAIL');
  });

  it('treats harness and infrastructure faults as ERROR', () => {
    expect(classifyFailure(new NavigationError('https://shop.test'))).toBe('ERROR');
    expect(classifyFailure(new ProviderError('openSession', 'down'))).toBe('ERROR');
    expect(classifyFailure(new ConfigurationError('no mode'))).toBe('ERROR');
    expect(classifyFailure(new TypeError('undefined is not a function'))).toBe('ERROR');
  });
});

describe('runTestUnit', () => {
  it('runs a passing LOCAL unit and closes its driver once', async () => {
    const driver = createMockDriver();
    driver.setElements(by.id('welcome'), [mockElement()]);
    const provider = createMockProvider();
    const sessions = new SessionManager({ launchLocal: async () => driver, provider });
    const unit: TestUnit = {
      id: 'home',
      async run({ actions }) {
        await actions.visit('https://shop.test/');
        if (!(await actions.isDisplayed(by.id('welcome')))) {
          throw new AssertionFailed('welcome banner missing', 'expect_visible');
        }
      },
    };

    const outcome = await runTestUnit(unit, { config: testConfig(), sessions });

    expect(outcome.status).toBe('PASS');
    expect(outcome.failure).toBeUndefined();
    expect(outcome.sessionId).toEqual(expect.any(String));
    expect(driver.closeCount).toBe(1);
    expect(provider.journal).toEqual([]);
  });

  it('reports a failing REMOTE unit to the provider before closing', async () => {
    const provider = createMockProvider();
    const sessions = new SessionManager({ launchLocal: async () => createMockDriver(), provider });
    const unit: TestUnit = {
      id: 'home',
      displayName: 'Home page',
      async run({ actions }) {
        await actions.visit('https://shop.test/');
        if (!(await actions.isDisplayed(by.id('welcome')))) {
          throw new AssertionFailed('welcome banner missing', 'expect_visible');
        }
      },
    };

    const outcome = await runTestUnit(unit, {
      config: testConfig({ mode: 'REMOTE', waitTimeoutMs: 0 }),
      sessions,
    });

    expect(outcome.status).toBe('FAIL');
    expect(outcome.failure).toEqual({
      kind: 'AssertionFailed',
      message: 'welcome banner missing (expect_visible)',
      operation: 'expect_visible',
    });
    expect(provider.envelopes[0]?.['acceptkit:options'].name).toBe('Home page');
    expect(provider.journal).toEqual([
      'provider.open:job-1',
      'provider.report:job-1:false',
      'provider.close:job-1',
      'driver.close:remote-job-1',
    ]);
  });

  it('turns an unset mode into an ERROR outcome without opening a session', async () => {
    let launched = false;
    const sessions = new SessionManager({
      launchLocal: async () => {
        launched = true;
        return createMockDriver();
      },
    });
    const unit: TestUnit = { id: 'home', run: async () => undefined };

    const outcome = await runTestUnit(unit, { config: testConfig({ mode: undefined }), sessions });

    expect(outcome.status).toBe('ERROR');
    expect(outcome.failure?.kind).toBe('ConfigurationError');
    expect(outcome.sessionId).toBeUndefined();
    expect(launched).toBe(false);
  });

  it('turns an unexpected exception into an ERROR outcome and still tears down', async () => {
    const driver = createMockDriver();
    const sessions = new SessionManager({ launchLocal: async () => driver });
    const unit: TestUnit = {
      id: 'broken',
      run: async () => {
        throw new RangeError('index out of range');
      },
    };

    const outcome = await runTestUnit(unit, { config: testConfig(), sessions });

    expect(outcome.status).toBe('ERROR');
    expect(outcome.failure).toEqual({ kind: 'UnexpectedError', message: 'index out of range' });
    expect(driver.closeCount).toBe(1);
    expect(sessions.liveSessions()).toEqual([]);
  });
});
