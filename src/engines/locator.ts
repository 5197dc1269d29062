import type { Locator } from '../types/index.js';

export const By = {
  id: (value: string): Locator => ({ using: 'id', value }),
  css: (value: string): Locator => ({ using: 'css', value }),
  tagName: (value: string): Locator => ({ using: 'tagName', value }),
  xpath: (value: string): Locator => ({ using: 'xpath', value }),
  testId: (value: string): Locator => ({ using: 'testId', value }),
  role: (role: string, name?: string): Locator =>
    name === undefined ? { using: 'role', value: role } : { using: 'role', value: role, name },
  text: (value: string): Locator => ({ using: 'text', value }),
};

export function describeLocator(locator: Locator): string {
  const args = [JSON.stringify(locator.value)];
  if (locator.name !== undefined) args.push(JSON.stringify(locator.name));
  return `By.${locator.using}(${args.join(', ')})`;
}
