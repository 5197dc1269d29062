import type { AutomationProbe, ElementHandle, Locator, SessionTimeouts } from '../types/index.js';
import { NoSuchElementError, ProbeError, messageOf } from '../exception/errors.js';
import { classifyFailure } from '../exception/classifier.js';
import { describeLocator } from './locator.js';

export interface PlaywrightPage {
  goto(
    url: string,
    options?: { waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit'; timeout?: number },
  ): Promise<unknown>;
  locator(selector: string): PlaywrightLocator;
  getByTestId(testId: string): PlaywrightLocator;
  getByRole(role: string, options?: { name?: string }): PlaywrightLocator;
  getByText(text: string): PlaywrightLocator;
  url(): string;
  title(): Promise<string>;
}

export interface PlaywrightLocator {
  count(): Promise<number>;
  nth(index: number): PlaywrightLocator;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  textContent(): Promise<string | null>;
  getAttribute(name: string): Promise<string | null>;
}

export const DEFAULT_SESSION_TIMEOUTS: SessionTimeouts = {
  implicitWaitMs: 0,
  pageLoadMs: 30_000,
};

export function resolveLocator(page: PlaywrightPage, locator: Locator): PlaywrightLocator {
  switch (locator.using) {
    case 'id':
      return page.locator(`[id=${JSON.stringify(locator.value)}]`);
    case 'css':
    case 'tagName':
      return page.locator(locator.value);
    case 'xpath':
      return page.locator(`xpath=${locator.value}`);
    case 'testId':
      return page.getByTestId(locator.value);
    case 'role':
      return page.getByRole(locator.value, locator.name === undefined ? undefined : { name: locator.name });
    case 'text':
      return page.getByText(locator.value);
  }
}

export function toProbeError(error: unknown): ProbeError {
  if (error instanceof ProbeError) return error;
  return new ProbeError(classifyFailure(error), messageOf(error), { cause: error });
}

async function guarded<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toProbeError(error);
  }
}

class PlaywrightElement implements ElementHandle {
  constructor(private readonly handle: PlaywrightLocator) {}

  isDisplayed(): Promise<boolean> {
    return guarded(() => this.handle.isVisible());
  }

  isEnabled(): Promise<boolean> {
    return guarded(() => this.handle.isEnabled());
  }

  async getText(): Promise<string> {
    const text = await guarded(() => this.handle.textContent());
    return text ?? '';
  }

  getAttribute(name: string): Promise<string | null> {
    return guarded(() => this.handle.getAttribute(name));
  }
}

/**
 * AutomationProbe over a Playwright page. Lookups are single-shot: waiting
 * belongs to the engine (or to an ImplicitWaitProbe around this one).
 */
export class PlaywrightProbe implements AutomationProbe {
  constructor(
    private readonly page: PlaywrightPage,
    readonly timeouts: SessionTimeouts = DEFAULT_SESSION_TIMEOUTS,
  ) {}

  async goto(url: string): Promise<void> {
    await guarded(() => this.page.goto(url, { waitUntil: 'load', timeout: this.timeouts.pageLoadMs }));
  }

  async findElements(locator: Locator): Promise<ElementHandle[]> {
    const target = resolveLocator(this.page, locator);
    const count = await guarded(() => target.count());
    return Array.from({ length: count }, (_, index) => new PlaywrightElement(target.nth(index)));
  }

  async findElement(locator: Locator): Promise<ElementHandle> {
    const [first] = await this.findElements(locator);
    if (!first) {
      throw new NoSuchElementError(describeLocator(locator));
    }
    return first;
  }

  getTitle(): Promise<string> {
    return guarded(() => this.page.title());
  }

  async getCurrentUrl(): Promise<string> {
    return this.page.url();
  }
}
