import { describe, it, expect } from 'vitest';
import { ConditionSpecSchema, WaitPlanSchema } from '../../src/schemas/wait-plan.schema.js';

describe('ConditionSpecSchema', () => {
  it('accepts nested combinators', () => {
    const result = ConditionSpecSchema.safeParse({
      kind: 'and',
      conditions: [
        { kind: 'titleIs', value: 'Example Domain' },
        { kind: 'not', condition: { kind: 'visibilityOfElementLocated', locator: { using: 'id', value: 'spinner' } } },
        {
          kind: 'or',
          conditions: [
            { kind: 'urlContains', value: '/done' },
            { kind: 'numberOfElementsToBe', locator: { using: 'css', value: 'li' }, count: 3 },
          ],
        },
      ],
    });
    expect(result.success).toBe(true);
  });

  it('rejects an unknown kind', () => {
    expect(ConditionSpecSchema.safeParse({ kind: 'alertIsPresent' }).success).toBe(false);
  });

  it('rejects an empty combinator', () => {
    expect(ConditionSpecSchema.safeParse({ kind: 'or', conditions: [] }).success).toBe(false);
  });

  it('rejects a count below one', () => {
    const locator = { using: 'css', value: 'li' };
    expect(ConditionSpecSchema.safeParse({ kind: 'numberOfElementsToBe', locator, count: 0 }).success).toBe(false);
  });

  it('rejects an unknown locator strategy', () => {
    const result = ConditionSpecSchema.safeParse({
      kind: 'presenceOfElementLocated',
      locator: { using: 'linkText', value: 'More' },
    });
    expect(result.success).toBe(false);
  });
});

describe('WaitPlanSchema', () => {
  const title = { id: 'title', condition: { kind: 'titleIs', value: 'Example Domain' } };

  it('accepts a plan with overrides', () => {
    const result = WaitPlanSchema.safeParse({
      url: 'https://example.com',
      defaults: { pollIntervalMs: 250 },
      session: { implicitWaitMs: 500 },
      waits: [{ ...title, profile: 'quick', timeoutMs: 1000, ignoring: ['NoSuchElement'] }],
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.waits[0].ignoring).toEqual(['NoSuchElement']);
      expect(result.data.session).toEqual({ implicitWaitMs: 500 });
    }
  });

  it('requires at least one wait', () => {
    expect(WaitPlanSchema.safeParse({ waits: [] }).success).toBe(false);
  });

  it('rejects a malformed url', () => {
    expect(WaitPlanSchema.safeParse({ url: 'not a url', waits: [title] }).success).toBe(false);
  });

  it('rejects an unknown failure kind', () => {
    expect(WaitPlanSchema.safeParse({ waits: [{ ...title, ignoring: ['Flaky'] }] }).success).toBe(false);
  });

  it('rejects a zero poll interval', () => {
    expect(WaitPlanSchema.safeParse({ waits: [{ ...title, pollIntervalMs: 0 }] }).success).toBe(false);
  });
});
