import type { AutomationProbe, ElementHandle, Locator } from '../types/index.js';
import { WaitTimeoutError } from '../exception/errors.js';
import { describeLocator } from '../engines/locator.js';
import { condition, settle } from './condition.js';
import { WaitEngine, defaultWaitEngine } from './wait-engine.js';
import { createWaitSpec } from './wait-spec.js';

export const CUSTOM_POLL_INTERVAL_MS = 500;

export interface PollTimeoutDetails {
  description: string;
  timeoutMs: number;
  elapsedMs: number;
  attempts: number;
  cause: WaitTimeoutError;
}

export interface PollOptions {
  timeoutMs: number;
  pollIntervalMs?: number;
  description?: string;
  signal?: AbortSignal;
  engine?: WaitEngine;
  /** Builds the error raised on timeout, in place of WaitTimeoutError. */
  onTimeout: (details: PollTimeoutDetails) => Error;
}

// Boxed so a matching falsy value still reads as success.
interface Hit<V> {
  value: V;
}

/**
 * Query the probe, test the result, sleep, repeat. "Not found" lookups count
 * as not yet; any other failure ends the poll.
 */
export async function pollFor<P, V>(
  probe: P,
  query: (probe: P, signal?: AbortSignal) => V | Promise<V>,
  predicate: (value: V) => boolean | Promise<boolean>,
  options: PollOptions,
): Promise<V> {
  const engine = options.engine ?? defaultWaitEngine;
  const spec = createWaitSpec({
    timeoutMs: options.timeoutMs,
    pollIntervalMs: options.pollIntervalMs ?? CUSTOM_POLL_INTERVAL_MS,
    ignoring: ['NoSuchElement'],
  });
  const check = condition<P, Hit<V>>(options.description ?? 'custom poll', (current, signal) =>
    settle(() => query(current, signal)).then(async (value) => ((await predicate(value)) ? { value } : null)),
  );

  try {
    const hit = await engine.until(probe, check, spec, { signal: options.signal });
    return hit.value;
  } catch (error) {
    if (error instanceof WaitTimeoutError) {
      throw options.onTimeout({
        description: error.description,
        timeoutMs: error.timeoutMs,
        elapsedMs: error.elapsedMs,
        attempts: error.attempts,
        cause: error,
      });
    }
    throw error;
  }
}

export function waitForDisplayedElement(
  probe: AutomationProbe,
  locator: Locator,
  options: Omit<PollOptions, 'description'>,
): Promise<ElementHandle> {
  return pollFor<AutomationProbe, ElementHandle>(
    probe,
    (current, signal) => current.findElement(locator, signal),
    (element) => element.isDisplayed(),
    { ...options, description: `${describeLocator(locator)} to be displayed` },
  );
}
