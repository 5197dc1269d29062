import type { Outcome } from '../types/index.js';
import { evaluateCondition, toCondition } from './condition.js';
import type { Condition, ConditionLike } from './condition.js';

function describeAll<P>(name: string, conditions: Condition<P, unknown>[]): string {
  return `${name}(${conditions.map((c) => c.description).join(', ')})`;
}

function pendingReason<P>(condition: Condition<P, unknown>, outcome: Outcome<unknown>): string {
  if (outcome.status === 'transient') {
    return `${condition.description} raised ${outcome.kind}`;
  }
  return `${condition.description} not satisfied`;
}

/**
 * Succeeds only when every condition succeeds within the same attempt.
 * Stops at the first condition that is not satisfied.
 */
export function and<P>(...likes: ConditionLike<P, unknown>[]): Condition<P, true> {
  const conditions = likes.map((like) => toCondition(like));
  return {
    description: describeAll('and', conditions),
    async evaluate(probe, context) {
      for (const condition of conditions) {
        const outcome = await evaluateCondition(condition, probe, context);
        if (outcome.status === 'fatal') return outcome;
        if (outcome.status !== 'success') {
          return { status: 'not_yet', reason: pendingReason(condition, outcome) };
        }
      }
      return { status: 'success', value: true };
    },
  };
}

/** Succeeds with the value of the first condition that succeeds. */
export function or<P, T>(...likes: ConditionLike<P, T>[]): Condition<P, T> {
  const conditions = likes.map((like) => toCondition(like));
  return {
    description: describeAll('or', conditions),
    async evaluate(probe, context) {
      const reasons: string[] = [];
      for (const condition of conditions) {
        const outcome = await evaluateCondition(condition, probe, context);
        if (outcome.status === 'success' || outcome.status === 'fatal') return outcome;
        reasons.push(pendingReason(condition, outcome));
      }
      return { status: 'not_yet', reason: reasons.join('; ') };
    },
  };
}

/**
 * Inverts success and "not yet". Fatal failures are passed through; ignored
 * failures count as "not yet" and therefore invert to success.
 */
export function not<P>(like: ConditionLike<P, unknown>): Condition<P, true> {
  const inner = toCondition(like);
  return {
    description: `not(${inner.description})`,
    async evaluate(probe, context) {
      const outcome = await evaluateCondition(inner, probe, context);
      switch (outcome.status) {
        case 'success':
          return { status: 'not_yet', reason: `${inner.description} is satisfied` };
        case 'fatal':
          return outcome;
        default:
          return { status: 'success', value: true };
      }
    },
  };
}
