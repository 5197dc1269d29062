import type { AutomationProbe, WaitConfig, WaitPlan, WaitStepResult } from '../types/index.js';
import {
  CancelledError,
  ConfigurationError,
  FatalConditionError,
  WaitTimeoutError,
  messageOf,
} from '../exception/errors.js';
import { ImplicitWaitProbe } from '../engines/implicit-wait-probe.js';
import { DEFAULT_WAIT_CONFIG, resolveSessionTimeouts, resolveWaitSpec } from '../config/loader.js';
import { WaitEngine, defaultWaitEngine } from '../wait/wait-engine.js';
import { buildCondition } from './condition-factory.js';

export type PlanRunEvent =
  | { type: 'wait_start'; waitId: string; index: number }
  | ({ type: 'wait_end'; index: number } & WaitStepResult);

export interface PlanRunOptions {
  engine?: WaitEngine;
  config?: WaitConfig;
  signal?: AbortSignal;
  emit?: (event: PlanRunEvent) => void;
}

export interface PlanRunResult {
  ok: boolean;
  results: WaitStepResult[];
  abortedAt?: string;
  durationMs: number;
}

/**
 * Run each planned wait in order against the probe, stopping at the first
 * wait that is not satisfied. Plan-level session timeouts win over config.
 */
export async function runWaitPlan(
  probe: AutomationProbe,
  plan: WaitPlan,
  options: PlanRunOptions = {},
): Promise<PlanRunResult> {
  const config = options.config ?? DEFAULT_WAIT_CONFIG;
  const baseEngine = options.engine ?? defaultWaitEngine;
  const clock = baseEngine.clock;
  const session = resolveSessionTimeouts(config, plan.session);
  // Implicit lookups run on a bare engine so observers only see the planned waits.
  const target =
    session.implicitWaitMs > 0
      ? new ImplicitWaitProbe(probe, session.implicitWaitMs, new WaitEngine({ clock }))
      : probe;

  let satisfiedAttempts: number | undefined;
  const engine = baseEngine.withObserver({
    record(event) {
      if (event.type === 'wait_satisfied') satisfiedAttempts = event.attempts;
    },
  });

  const start = clock.now();
  const results: WaitStepResult[] = [];

  for (let i = 0; i < plan.waits.length; i++) {
    const wait = plan.waits[i];
    options.emit?.({ type: 'wait_start', waitId: wait.id, index: i });

    const waitStart = clock.now();
    let result: WaitStepResult;
    try {
      const spec = resolveWaitSpec(config, wait.profile, plan.defaults, wait);
      const condition = buildCondition(wait.condition);
      satisfiedAttempts = undefined;
      await engine.until(target, condition, spec, { signal: options.signal });
      result = {
        waitId: wait.id,
        ok: true,
        description: condition.description,
        attempts: satisfiedAttempts,
        durationMs: Math.round(clock.now() - waitStart),
      };
    } catch (error) {
      result = failedStep(wait.id, error, Math.round(clock.now() - waitStart));
    }

    results.push(result);
    options.emit?.({ type: 'wait_end', index: i, ...result });

    if (!result.ok) {
      return { ok: false, results, abortedAt: wait.id, durationMs: Math.round(clock.now() - start) };
    }
  }

  return { ok: true, results, durationMs: Math.round(clock.now() - start) };
}

function failedStep(waitId: string, error: unknown, durationMs: number): WaitStepResult {
  if (error instanceof WaitTimeoutError) {
    return {
      waitId,
      ok: false,
      description: error.description,
      attempts: error.attempts,
      errorType: 'timeout',
      message: error.message,
      durationMs,
    };
  }
  if (error instanceof FatalConditionError) {
    return {
      waitId,
      ok: false,
      description: error.description,
      attempts: error.attempts,
      errorType: 'fatal',
      message: error.message,
      durationMs,
    };
  }
  if (error instanceof CancelledError) {
    return {
      waitId,
      ok: false,
      description: error.description,
      attempts: error.attempts,
      errorType: 'cancelled',
      message: error.message,
      durationMs,
    };
  }
  if (error instanceof ConfigurationError) {
    return { waitId, ok: false, errorType: 'config', message: messageOf(error), durationMs };
  }
  throw error;
}
