import type { WaitSpec, WaitSpecInput } from '../types/index.js';
import { WaitSpecInputSchema } from '../schemas/index.js';
import { ConfigurationError } from '../exception/errors.js';

export const DEFAULT_POLL_INTERVAL_MS = 500;

/**
 * Validate and freeze a wait configuration. A frozen spec can be shared
 * between any number of concurrent waits.
 */
export function createWaitSpec(input: WaitSpecInput): WaitSpec {
  const parsed = WaitSpecInputSchema.safeParse({
    ...input,
    ignoring: input.ignoring ? [...input.ignoring] : undefined,
  });
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid wait spec',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'spec'}: ${issue.message}`),
    );
  }

  const { timeoutMs, pollIntervalMs, ignoring, message } = parsed.data;
  return Object.freeze({
    timeoutMs,
    pollIntervalMs: pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    ignoring: new Set(ignoring ?? []),
    ...(message ? { message } : {}),
  });
}

/**
 * Checks the numeric invariants of a spec that may not have come through
 * createWaitSpec (e.g. a hand-written object literal).
 */
export function assertValidWaitSpec(spec: WaitSpec): void {
  const issues: string[] = [];
  if (!Number.isFinite(spec.pollIntervalMs) || spec.pollIntervalMs <= 0) {
    issues.push(`pollIntervalMs: must be a positive number, got ${spec.pollIntervalMs}`);
  }
  if (!Number.isFinite(spec.timeoutMs) || spec.timeoutMs < 0) {
    issues.push(`timeoutMs: must be a non-negative number, got ${spec.timeoutMs}`);
  }
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid wait spec', issues);
  }
}
