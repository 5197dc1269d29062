export * from './outcome.js';
export * from './wait-spec.js';
export * from './probe.js';
export * from './wait-event.js';
export * from './wait-plan.js';
export * from './step-result.js';
