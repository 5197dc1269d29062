import type { PendingOutcome, WaitEvent, WaitObserver, WaitSpec } from '../types/index.js';
import { CancelledError, FatalConditionError, WaitTimeoutError, messageOf } from '../exception/errors.js';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';
import { evaluateCondition, toCondition } from './condition.js';
import type { ConditionLike, EvaluationContext } from './condition.js';
import { assertValidWaitSpec } from './wait-spec.js';

export interface WaitOptions {
  signal?: AbortSignal;
  /** Replaces the condition's own description in events and errors. */
  description?: string;
}

export interface WaitEngineOptions {
  clock?: Clock;
  observers?: WaitObserver[];
}

/**
 * Polls a condition against a probe until it succeeds or its deadline
 * passes. The engine keeps no state between `until` calls, so one instance
 * can serve any number of concurrent waits.
 */
export class WaitEngine {
  readonly clock: Clock;
  private readonly observers: readonly WaitObserver[];

  constructor(options: WaitEngineOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.observers = options.observers ?? [];
  }

  withObserver(observer: WaitObserver): WaitEngine {
    return new WaitEngine({ clock: this.clock, observers: [...this.observers, observer] });
  }

  async until<P, T>(
    probe: P,
    conditionLike: ConditionLike<P, T>,
    spec: WaitSpec,
    options: WaitOptions = {},
  ): Promise<T> {
    assertValidWaitSpec(spec);

    const condition = toCondition(conditionLike);
    const description = options.description ?? condition.description;
    const { signal } = options;
    const context: EvaluationContext = { ignoring: spec.ignoring, signal };

    const start = this.clock.now();
    const deadline = start + spec.timeoutMs;
    let attempts = 0;

    for (;;) {
      if (signal?.aborted) {
        throw await this.cancelled(description, attempts, this.clock.now() - start);
      }

      attempts++;
      const outcome = await evaluateCondition(condition, probe, context);
      const elapsedMs = this.clock.now() - start;
      await this.emit({
        type: 'wait_attempt',
        description,
        attempt: attempts,
        elapsedMs,
        status: outcome.status,
        ...(outcome.status === 'transient' || outcome.status === 'fatal' ? { kind: outcome.kind } : {}),
      });

      // A condition that failed because the wait was aborted reports the abort.
      if (outcome.status !== 'success' && signal?.aborted) {
        throw await this.cancelled(description, attempts, elapsedMs);
      }

      if (outcome.status === 'success') {
        await this.emit({ type: 'wait_satisfied', description, attempts, elapsedMs });
        return outcome.value;
      }

      if (outcome.status === 'fatal') {
        await this.emit({
          type: 'wait_failed',
          description,
          attempts,
          elapsedMs,
          kind: outcome.kind,
          message: messageOf(outcome.error),
        });
        throw new FatalConditionError(description, outcome.kind, attempts, elapsedMs, outcome.error);
      }

      const lastOutcome: PendingOutcome = outcome;
      const now = this.clock.now();
      if (now >= deadline) {
        await this.emit({
          type: 'wait_timeout',
          description,
          attempts,
          elapsedMs: now - start,
          timeoutMs: spec.timeoutMs,
        });
        throw new WaitTimeoutError({
          description,
          timeoutMs: spec.timeoutMs,
          elapsedMs: now - start,
          attempts,
          lastOutcome,
          message: spec.message,
        });
      }

      try {
        await this.clock.sleep(Math.min(spec.pollIntervalMs, deadline - now), signal);
      } catch (error) {
        if (signal?.aborted) {
          throw await this.cancelled(description, attempts, this.clock.now() - start);
        }
        throw error;
      }
    }
  }

  private async cancelled(description: string, attempts: number, elapsedMs: number): Promise<CancelledError> {
    await this.emit({ type: 'wait_cancelled', description, attempts, elapsedMs });
    return new CancelledError(description, attempts, elapsedMs);
  }

  private async emit(event: WaitEvent): Promise<void> {
    for (const observer of this.observers) {
      await observer.record(event);
    }
  }
}

export const defaultWaitEngine = new WaitEngine();

export function waitUntil<P, T>(
  probe: P,
  condition: ConditionLike<P, T>,
  spec: WaitSpec,
  options?: WaitOptions,
): Promise<T> {
  return defaultWaitEngine.until(probe, condition, spec, options);
}
