export type FailureKind =
  | 'NoSuchElement'
  | 'StaleElement'
  | 'NotInteractable'
  | 'InvalidSelector'
  | 'SessionClosed'
  | 'Timeout'
  | 'Unknown';

export type OutcomeStatus = 'success' | 'not_yet' | 'transient' | 'fatal';

export interface SuccessOutcome<T> {
  status: 'success';
  value: T;
}

export interface NotYetOutcome {
  status: 'not_yet';
  reason?: string;
}

export interface TransientOutcome {
  status: 'transient';
  kind: FailureKind;
  error: unknown;
}

export interface FatalOutcome {
  status: 'fatal';
  kind: FailureKind;
  error: unknown;
}

export type PendingOutcome = NotYetOutcome | TransientOutcome;

export type Outcome<T> = SuccessOutcome<T> | PendingOutcome | FatalOutcome;
