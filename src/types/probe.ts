export type LocatorStrategy = 'id' | 'css' | 'tagName' | 'xpath' | 'testId' | 'role' | 'text';

export interface Locator {
  using: LocatorStrategy;
  value: string;
  /** Accessible name, only meaningful for `role` locators. */
  name?: string;
}

export interface ElementHandle {
  isDisplayed(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  getText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
}

/**
 * Lookups take the calling wait's signal; a probe that waits inside a lookup
 * stops when it aborts. Single-shot probes may ignore it.
 */
export interface AutomationProbe {
  /** Resolves to an empty array when nothing matches. */
  findElements(locator: Locator, signal?: AbortSignal): Promise<ElementHandle[]>;
  /** Rejects with NoSuchElementError when nothing matches. */
  findElement(locator: Locator, signal?: AbortSignal): Promise<ElementHandle>;
  getTitle(): Promise<string>;
  getCurrentUrl(): Promise<string>;
}
