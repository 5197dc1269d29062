import type { FailureKind } from './outcome.js';
import type { Locator } from './probe.js';
import type { SessionTimeouts } from './wait-spec.js';

export type ConditionSpec =
  | { kind: 'titleIs'; value: string }
  | { kind: 'titleContains'; value: string }
  | { kind: 'urlContains'; value: string }
  | { kind: 'urlMatches'; pattern: string }
  | { kind: 'presenceOfElementLocated'; locator: Locator }
  | { kind: 'presenceOfAllElementsLocated'; locator: Locator }
  | { kind: 'visibilityOfElementLocated'; locator: Locator }
  | { kind: 'invisibilityOfElementLocated'; locator: Locator }
  | { kind: 'elementToBeClickable'; locator: Locator }
  | { kind: 'textToBePresentInElementLocated'; locator: Locator; text: string }
  | { kind: 'numberOfElementsToBe'; locator: Locator; count: number }
  | { kind: 'attributeToBe'; locator: Locator; attribute: string; value: string }
  | { kind: 'and'; conditions: ConditionSpec[] }
  | { kind: 'or'; conditions: ConditionSpec[] }
  | { kind: 'not'; condition: ConditionSpec };

export interface WaitSpecOverrides {
  timeoutMs?: number;
  pollIntervalMs?: number;
  ignoring?: FailureKind[];
  message?: string;
}

export interface PlannedWait extends WaitSpecOverrides {
  id: string;
  condition: ConditionSpec;
  profile?: string;
}

export interface WaitPlan {
  url?: string;
  defaults?: WaitSpecOverrides;
  session?: Partial<SessionTimeouts>;
  waits: PlannedWait[];
}

export interface WaitConfig {
  defaults: WaitSpecOverrides & { timeoutMs: number };
  profiles: Record<string, WaitSpecOverrides>;
  session: SessionTimeouts;
}
