export * from './wait-spec.schema.js';
export * from './wait-plan.schema.js';
