import type { AutomationProbe, ElementHandle, Locator, WaitSpec } from '../types/index.js';
import { FatalConditionError, NoSuchElementError, WaitTimeoutError } from '../exception/errors.js';
import { WaitEngine, defaultWaitEngine } from '../wait/wait-engine.js';
import { createWaitSpec } from '../wait/wait-spec.js';
import { describeLocator } from './locator.js';

export const IMPLICIT_POLL_INTERVAL_MS = 250;

// Lookup failures surface as the probe's own error, as a single-shot lookup would.
function unwrapFatal(error: unknown): unknown {
  return error instanceof FatalConditionError ? error.cause : error;
}

/**
 * Gives element lookups on the wrapped probe an implicit wait. The timeout is
 * fixed per instance; `withImplicitWait` returns a new probe instead of
 * changing this one. An aborted lookup rejects with `CancelledError`.
 */
export class ImplicitWaitProbe implements AutomationProbe {
  private readonly spec: WaitSpec;

  constructor(
    private readonly inner: AutomationProbe,
    readonly implicitWaitMs: number,
    private readonly engine: WaitEngine = defaultWaitEngine,
  ) {
    this.spec = createWaitSpec({
      timeoutMs: implicitWaitMs,
      pollIntervalMs: IMPLICIT_POLL_INTERVAL_MS,
      ignoring: ['NoSuchElement'],
    });
  }

  withImplicitWait(implicitWaitMs: number): ImplicitWaitProbe {
    return new ImplicitWaitProbe(this.inner, implicitWaitMs, this.engine);
  }

  async findElement(locator: Locator, signal?: AbortSignal): Promise<ElementHandle> {
    try {
      return await this.engine.until<AutomationProbe, ElementHandle>(
        this.inner,
        (probe, lookupSignal) => probe.findElement(locator, lookupSignal),
        this.spec,
        { description: `element located by ${describeLocator(locator)}`, signal },
      );
    } catch (error) {
      if (error instanceof WaitTimeoutError) {
        throw new NoSuchElementError(describeLocator(locator));
      }
      throw unwrapFatal(error);
    }
  }

  /** Resolves to an empty array once the implicit wait lapses. */
  async findElements(locator: Locator, signal?: AbortSignal): Promise<ElementHandle[]> {
    try {
      return await this.engine.until<AutomationProbe, ElementHandle[]>(
        this.inner,
        (probe, lookupSignal) => probe.findElements(locator, lookupSignal),
        this.spec,
        { description: `elements located by ${describeLocator(locator)}`, signal },
      );
    } catch (error) {
      if (error instanceof WaitTimeoutError) return [];
      throw unwrapFatal(error);
    }
  }

  getTitle(): Promise<string> {
    return this.inner.getTitle();
  }

  getCurrentUrl(): Promise<string> {
    return this.inner.getCurrentUrl();
  }
}
