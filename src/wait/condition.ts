import type { FailureKind, Outcome } from '../types/index.js';
import { classifyFailure } from '../exception/classifier.js';

export interface EvaluationContext {
  ignoring: ReadonlySet<FailureKind>;
  signal?: AbortSignal;
}

/** Values a condition returns to mean "not satisfied yet". Empty arrays count too. */
export type Absent = null | undefined | false;

/** `signal` is the wait's own signal, for conditions that wait on something themselves. */
export type ConditionFn<P, T> = (probe: P, signal?: AbortSignal) => T | Absent | Promise<T | Absent>;

export interface Condition<P, T> {
  readonly description: string;
  evaluate(probe: P, context: EvaluationContext): Promise<Outcome<T>>;
}

export type ConditionLike<P, T> = Condition<P, T> | ConditionFn<P, T>;

export function condition<P, T>(description: string, fn: ConditionFn<P, T>): Condition<P, T> {
  return {
    description,
    evaluate: (probe, context) => evaluateFn(fn, probe, context),
  };
}

export function toCondition<P, T>(like: ConditionLike<P, T>): Condition<P, T> {
  if (typeof like === 'function') {
    return condition(like.name || 'custom condition', like);
  }
  return like;
}

function evaluateFn<P, T>(
  fn: ConditionFn<P, T>,
  probe: P,
  context: EvaluationContext,
): Promise<Outcome<T>> {
  return settle<T | Absent>(() => fn(probe, context.signal)).then(
    (value) => toOutcome(value),
    (error: unknown) => failureOutcome(error, context),
  );
}

function toOutcome<T>(value: T | Absent): Outcome<T> {
  if (value === null || value === undefined || value === false) {
    return { status: 'not_yet' };
  }
  if (Array.isArray(value) && value.length === 0) {
    return { status: 'not_yet', reason: 'empty result' };
  }
  return { status: 'success', value };
}

/**
 * Evaluates any condition, hand-written ones included. A throw from
 * `evaluate` is classified like a throw from a condition function.
 */
export function evaluateCondition<P, T>(
  condition: Condition<P, T>,
  probe: P,
  context: EvaluationContext,
): Promise<Outcome<T>> {
  return settle(() => condition.evaluate(probe, context)).catch((error: unknown) => failureOutcome(error, context));
}

/** Runs `fn` inside a promise so a synchronous throw becomes a rejection. */
export function settle<T>(fn: () => T | PromiseLike<T>): Promise<T> {
  return new Promise<T>((resolve) => resolve(fn()));
}

export function failureOutcome(error: unknown, context: EvaluationContext): Outcome<never> {
  const kind = classifyFailure(error);
  if (context.ignoring.has(kind)) {
    return { status: 'transient', kind, error };
  }
  return { status: 'fatal', kind, error };
}
