import type { FailureKind, OutcomeStatus } from './outcome.js';

interface WaitEventBase {
  description: string;
  elapsedMs: number;
}

export interface WaitAttemptEvent extends WaitEventBase {
  type: 'wait_attempt';
  attempt: number;
  status: OutcomeStatus;
  kind?: FailureKind;
}

export interface WaitSatisfiedEvent extends WaitEventBase {
  type: 'wait_satisfied';
  attempts: number;
}

export interface WaitTimeoutEvent extends WaitEventBase {
  type: 'wait_timeout';
  attempts: number;
  timeoutMs: number;
}

export interface WaitFailedEvent extends WaitEventBase {
  type: 'wait_failed';
  attempts: number;
  kind: FailureKind;
  message: string;
}

export interface WaitCancelledEvent extends WaitEventBase {
  type: 'wait_cancelled';
  attempts: number;
}

export type WaitEvent =
  | WaitAttemptEvent
  | WaitSatisfiedEvent
  | WaitTimeoutEvent
  | WaitFailedEvent
  | WaitCancelledEvent;

export interface WaitObserver {
  record(event: WaitEvent): void | Promise<void>;
}
