import type { FailureKind, WaitSpecInput } from '../types/index.js';
import type { ConditionLike } from './condition.js';
import { WaitEngine, defaultWaitEngine } from './wait-engine.js';
import { createWaitSpec } from './wait-spec.js';

/**
 * Fluent wait bound to one probe. Every builder call returns a new
 * ProbeWait; the wait settings are validated when `until` runs.
 *
 * @example
 * const element = await new ProbeWait(probe, { timeoutMs: 30_000 })
 *   .pollingEvery(5_000)
 *   .ignoring('NoSuchElement')
 *   .until(visibilityOfElementLocated(By.id('dynamicElement')));
 */
export class ProbeWait<P> {
  constructor(
    private readonly probe: P,
    private readonly input: WaitSpecInput,
    private readonly engine: WaitEngine = defaultWaitEngine,
  ) {}

  withTimeout(timeoutMs: number): ProbeWait<P> {
    return this.with({ timeoutMs });
  }

  pollingEvery(pollIntervalMs: number): ProbeWait<P> {
    return this.with({ pollIntervalMs });
  }

  ignoring(...kinds: FailureKind[]): ProbeWait<P> {
    return this.with({ ignoring: [...(this.input.ignoring ?? []), ...kinds] });
  }

  withMessage(message: string): ProbeWait<P> {
    return this.with({ message });
  }

  async until<T>(condition: ConditionLike<P, T>, signal?: AbortSignal): Promise<T> {
    return this.engine.until(this.probe, condition, createWaitSpec(this.input), { signal });
  }

  private with(changes: Partial<WaitSpecInput>): ProbeWait<P> {
    return new ProbeWait(this.probe, { ...this.input, ...changes }, this.engine);
  }
}
