import { describe, expect, it } from 'vitest';

import { by } from '../schema/locator.js';
import { createMockDriver, mockElement } from '../driver/mock.js';
import { startLocalSession } from '../test-utils.js';
import { createActions } from './facade.js';
import type { Actions } from './facade.js';

// A page object declares its locators once and composes facade operations.
class LoginPage {
  static readonly email = by.id('email');
  static readonly password = by.id('password');
  static readonly submit = by.role('button', 'Sign in');
  static readonly greeting = by.testId('greeting');

  constructor(private readonly actions: Actions) {}

  async open(): Promise<void> {
    await this.actions.visit('https://shop.test/login');
  }

  async signIn(email: string, password: string): Promise<string> {
    await this.actions.type(LoginPage.email, email);
    await this.actions.type(LoginPage.password, password);
    await this.actions.click(LoginPage.submit);
    return this.actions.text(LoginPage.greeting);
  }
}

describe('page objects over the facade', () => {
  it('drive the session through declared locators', async () => {
    const driver = createMockDriver();
    const email = mockElement();
    const password = mockElement();
    const greeting = mockElement({ text: '' });
    const submit = mockElement({
      onClick: () => {
        greeting.text = `Hello ${email.value}`;
      },
    });
    driver.setElements(LoginPage.email, [email]);
    driver.setElements(LoginPage.password, [password]);
    driver.setElements(LoginPage.submit, [submit]);
    driver.setElements(LoginPage.greeting, [greeting]);

    const { handle } = await startLocalSession(driver, 'login');
    const page = new LoginPage(createActions(handle));

    await page.open();
    const text = await page.signIn('ada@example.test', 'test-secret');

    expect(text).toBe('Hello ada@example.test');
    expect(password.value).toBe('test-secret');
    expect(driver.visited).toEqual(['https://shop.test/login']);
  });
});
