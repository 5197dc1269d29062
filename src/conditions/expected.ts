import type { AutomationProbe, ElementHandle, Locator } from '../types/index.js';
import { ConfigurationError, ProbeError, messageOf } from '../exception/errors.js';
import { describeLocator } from '../engines/locator.js';
import { condition } from '../wait/condition.js';
import type { Condition } from '../wait/condition.js';

export type ProbeCondition<T> = Condition<AutomationProbe, T>;

export function titleIs(title: string): ProbeCondition<boolean> {
  return condition(`title to be ${JSON.stringify(title)}`, async (probe: AutomationProbe) => {
    return (await probe.getTitle()) === title;
  });
}

export function titleContains(fragment: string): ProbeCondition<boolean> {
  return condition(`title to contain ${JSON.stringify(fragment)}`, async (probe: AutomationProbe) => {
    return (await probe.getTitle()).includes(fragment);
  });
}

export function urlContains(fragment: string): ProbeCondition<boolean> {
  return condition(`url to contain ${JSON.stringify(fragment)}`, async (probe: AutomationProbe) => {
    return (await probe.getCurrentUrl()).includes(fragment);
  });
}

export function urlMatches(pattern: RegExp | string): ProbeCondition<boolean> {
  const regex = typeof pattern === 'string' ? compilePattern(pattern) : pattern;
  return condition(`url to match ${String(regex)}`, async (probe: AutomationProbe) => {
    return regex.test(await probe.getCurrentUrl());
  });
}

function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigurationError(`Invalid url pattern ${JSON.stringify(pattern)}: ${messageOf(error)}`);
  }
}

function isGone(error: unknown): boolean {
  return error instanceof ProbeError && (error.kind === 'NoSuchElement' || error.kind === 'StaleElement');
}

/**
 * Reads the first element matching `locator`. An element that is missing or
 * detached makes the condition "not yet" rather than a failure.
 */
async function whenLocated<T>(
  probe: AutomationProbe,
  locator: Locator,
  signal: AbortSignal | undefined,
  read: (element: ElementHandle) => Promise<T | null>,
): Promise<T | null> {
  try {
    return await read(await probe.findElement(locator, signal));
  } catch (error) {
    if (isGone(error)) return null;
    throw error;
  }
}

export function presenceOfElementLocated(locator: Locator): ProbeCondition<ElementHandle> {
  return condition(
    `presence of element located by ${describeLocator(locator)}`,
    (probe: AutomationProbe, signal?: AbortSignal) => whenLocated(probe, locator, signal, async (element) => element),
  );
}

export function presenceOfAllElementsLocated(locator: Locator): ProbeCondition<ElementHandle[]> {
  return condition(
    `presence of all elements located by ${describeLocator(locator)}`,
    (probe: AutomationProbe, signal?: AbortSignal) => probe.findElements(locator, signal),
  );
}

export function visibilityOfElementLocated(locator: Locator): ProbeCondition<ElementHandle> {
  return condition(
    `visibility of element located by ${describeLocator(locator)}`,
    (probe: AutomationProbe, signal?: AbortSignal) =>
      whenLocated(probe, locator, signal, async (element) => ((await element.isDisplayed()) ? element : null)),
  );
}

/** Absent, detached and hidden elements all count as invisible. */
export function invisibilityOfElementLocated(locator: Locator): ProbeCondition<boolean> {
  return condition(
    `invisibility of element located by ${describeLocator(locator)}`,
    async (probe: AutomationProbe, signal?: AbortSignal) => {
      try {
        const elements = await probe.findElements(locator, signal);
        for (const element of elements) {
          if (await element.isDisplayed()) return false;
        }
        return true;
      } catch (error) {
        if (isGone(error)) return true;
        throw error;
      }
    },
  );
}

export function elementToBeClickable(locator: Locator): ProbeCondition<ElementHandle> {
  return condition(
    `element located by ${describeLocator(locator)} to be clickable`,
    (probe: AutomationProbe, signal?: AbortSignal) =>
      whenLocated(probe, locator, signal, async (element) => {
        if (!(await element.isDisplayed())) return null;
        return (await element.isEnabled()) ? element : null;
      }),
  );
}

export function textToBePresentInElementLocated(locator: Locator, text: string): ProbeCondition<boolean> {
  return condition(
    `text ${JSON.stringify(text)} to be present in element located by ${describeLocator(locator)}`,
    (probe: AutomationProbe, signal?: AbortSignal) =>
      whenLocated(probe, locator, signal, async (element) => (await element.getText()).includes(text)),
  );
}

/** `count` must be at least 1; wait for zero matches with invisibilityOfElementLocated. */
export function numberOfElementsToBe(locator: Locator, count: number): ProbeCondition<ElementHandle[]> {
  if (!Number.isInteger(count) || count < 1) {
    throw new ConfigurationError(`numberOfElementsToBe needs a positive integer count, got ${count}`);
  }
  return condition(
    `number of elements located by ${describeLocator(locator)} to be ${count}`,
    async (probe: AutomationProbe, signal?: AbortSignal) => {
      const elements = await probe.findElements(locator, signal);
      return elements.length === count ? elements : null;
    },
  );
}

export function attributeToBe(locator: Locator, attribute: string, value: string): ProbeCondition<boolean> {
  return condition(
    `attribute ${JSON.stringify(attribute)} of element located by ${describeLocator(locator)} to be ${JSON.stringify(value)}`,
    (probe: AutomationProbe, signal?: AbortSignal) =>
      whenLocated(probe, locator, signal, async (element) => (await element.getAttribute(attribute)) === value),
  );
}
