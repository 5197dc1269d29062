export * from './types/index.js';
export * from './schemas/index.js';
export * from './exception/errors.js';
export { classifyFailure } from './exception/classifier.js';
export { systemClock } from './wait/clock.js';
export type { Clock } from './wait/clock.js';
export { condition, toCondition } from './wait/condition.js';
export type { Absent, Condition, ConditionFn, ConditionLike, EvaluationContext } from './wait/condition.js';
export { and, or, not } from './wait/combinators.js';
export { WaitEngine, defaultWaitEngine, waitUntil } from './wait/wait-engine.js';
export type { WaitEngineOptions, WaitOptions } from './wait/wait-engine.js';
export { DEFAULT_POLL_INTERVAL_MS, createWaitSpec, assertValidWaitSpec } from './wait/wait-spec.js';
export { ProbeWait } from './wait/probe-wait.js';
export { CUSTOM_POLL_INTERVAL_MS, pollFor, waitForDisplayedElement } from './wait/custom-wait.js';
export type { PollOptions, PollTimeoutDetails } from './wait/custom-wait.js';
export * from './conditions/expected.js';
export { By, describeLocator } from './engines/locator.js';
export { PlaywrightProbe, DEFAULT_SESSION_TIMEOUTS, resolveLocator, toProbeError } from './engines/playwright-probe.js';
export type { PlaywrightLocator, PlaywrightPage } from './engines/playwright-probe.js';
export { ImplicitWaitProbe, IMPLICIT_POLL_INTERVAL_MS } from './engines/implicit-wait-probe.js';
export {
  DEFAULT_WAIT_CONFIG,
  loadWaitConfig,
  parseWaitConfig,
  resolveSessionTimeouts,
  resolveWaitSpec,
} from './config/loader.js';
export { WaitLogger } from './logging/wait-logger.js';
export { buildSummaryMarkdown, writeSummary } from './logging/summary-writer.js';
export { WaitMetricsCollector } from './metrics/collector.js';
export type { WaitMetrics, WaitStats } from './metrics/collector.js';
export { buildCondition } from './runner/condition-factory.js';
export { runWaitPlan } from './runner/plan-runner.js';
export type { PlanRunEvent, PlanRunOptions, PlanRunResult } from './runner/plan-runner.js';
export { ManualClock } from './testing/manual-clock.js';
export { FakeElement, FakeProbe } from './testing/fake-probe.js';
