import type { FailureKind } from './outcome.js';

export interface WaitSpec {
  readonly timeoutMs: number;
  readonly pollIntervalMs: number;
  readonly ignoring: ReadonlySet<FailureKind>;
  readonly message?: string;
}

export interface WaitSpecInput {
  timeoutMs: number;
  pollIntervalMs?: number;
  ignoring?: Iterable<FailureKind>;
  message?: string;
}

export interface SessionTimeouts {
  implicitWaitMs: number;
  pageLoadMs: number;
}
