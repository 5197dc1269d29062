import { z } from 'zod';
import type { ConditionSpec } from '../types/index.js';
import { SessionTimeoutsSchema, WaitSpecOverridesSchema } from './wait-spec.schema.js';

export const LocatorSchema = z.object({
  using: z.enum(['id', 'css', 'tagName', 'xpath', 'testId', 'role', 'text']),
  value: z.string().min(1),
  name: z.string().optional(),
});

export const ConditionSpecSchema: z.ZodType<ConditionSpec> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('titleIs'), value: z.string() }),
    z.object({ kind: z.literal('titleContains'), value: z.string() }),
    z.object({ kind: z.literal('urlContains'), value: z.string() }),
    z.object({ kind: z.literal('urlMatches'), pattern: z.string() }),
    z.object({ kind: z.literal('presenceOfElementLocated'), locator: LocatorSchema }),
    z.object({ kind: z.literal('presenceOfAllElementsLocated'), locator: LocatorSchema }),
    z.object({ kind: z.literal('visibilityOfElementLocated'), locator: LocatorSchema }),
    z.object({ kind: z.literal('invisibilityOfElementLocated'), locator: LocatorSchema }),
    z.object({ kind: z.literal('elementToBeClickable'), locator: LocatorSchema }),
    z.object({
      kind: z.literal('textToBePresentInElementLocated'),
      locator: LocatorSchema,
      text: z.string(),
    }),
    z.object({
      kind: z.literal('numberOfElementsToBe'),
      locator: LocatorSchema,
      count: z.number().int().positive(),
    }),
    z.object({
      kind: z.literal('attributeToBe'),
      locator: LocatorSchema,
      attribute: z.string().min(1),
      value: z.string(),
    }),
    z.object({ kind: z.literal('and'), conditions: z.array(ConditionSpecSchema).min(1) }),
    z.object({ kind: z.literal('or'), conditions: z.array(ConditionSpecSchema).min(1) }),
    z.object({ kind: z.literal('not'), condition: ConditionSpecSchema }),
  ]),
);

export const PlannedWaitSchema = WaitSpecOverridesSchema.extend({
  id: z.string().min(1),
  condition: ConditionSpecSchema,
  profile: z.string().optional(),
});

export const WaitPlanSchema = z.object({
  url: z.string().url().optional(),
  defaults: WaitSpecOverridesSchema.optional(),
  session: SessionTimeoutsSchema.partial().optional(),
  waits: z.array(PlannedWaitSchema).min(1),
});
