import type { FailureKind, PendingOutcome } from '../types/index.js';

export type WaitErrorCode = 'CONFIGURATION' | 'TIMEOUT' | 'FATAL' | 'CANCELLED' | 'PROBE';

export class WaitError extends Error {
  constructor(
    readonly code: WaitErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends WaitError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super('CONFIGURATION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export interface TimeoutDetails {
  description: string;
  timeoutMs: number;
  elapsedMs: number;
  attempts: number;
  lastOutcome: PendingOutcome;
  message?: string;
}

export class WaitTimeoutError extends WaitError {
  readonly description: string;
  readonly timeoutMs: number;
  readonly elapsedMs: number;
  readonly attempts: number;
  readonly lastOutcome: PendingOutcome;

  constructor(details: TimeoutDetails) {
    const subject = details.message ?? details.description;
    const attemptsLabel = details.attempts === 1 ? 'attempt' : 'attempts';
    super(
      'TIMEOUT',
      `Timed out after ${Math.round(details.elapsedMs)}ms waiting for ${subject} (${details.attempts} ${attemptsLabel})`,
      details.lastOutcome.status === 'transient' ? { cause: details.lastOutcome.error } : undefined,
    );
    this.description = details.description;
    this.timeoutMs = details.timeoutMs;
    this.elapsedMs = details.elapsedMs;
    this.attempts = details.attempts;
    this.lastOutcome = details.lastOutcome;
  }
}

export class FatalConditionError extends WaitError {
  constructor(
    readonly description: string,
    readonly kind: FailureKind,
    readonly attempts: number,
    readonly elapsedMs: number,
    cause: unknown,
  ) {
    super('FATAL', `Condition ${description} failed on attempt ${attempts}: ${messageOf(cause)}`, { cause });
  }
}

export class CancelledError extends WaitError {
  constructor(
    readonly description: string,
    readonly attempts: number,
    readonly elapsedMs: number,
  ) {
    super('CANCELLED', `Wait for ${description} was cancelled after ${attempts} attempts`);
  }
}

export class ProbeError extends WaitError {
  constructor(
    readonly kind: FailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('PROBE', message, options);
  }
}

export class NoSuchElementError extends ProbeError {
  constructor(locatorDescription: string) {
    super('NoSuchElement', `No element found for ${locatorDescription}`);
  }
}

export function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
