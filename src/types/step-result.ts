export type WaitErrorType = 'timeout' | 'fatal' | 'cancelled' | 'config';

export interface WaitStepResult {
  waitId: string;
  ok: boolean;
  description?: string;
  attempts?: number;
  errorType?: WaitErrorType;
  message?: string;
  durationMs?: number;
}
