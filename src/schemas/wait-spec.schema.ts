import { z } from 'zod';

export const FailureKindSchema = z.enum([
  'NoSuchElement',
  'StaleElement',
  'NotInteractable',
  'InvalidSelector',
  'SessionClosed',
  'Timeout',
  'Unknown',
]);

const TimeoutMsSchema = z.number().finite().nonnegative();
const PollIntervalMsSchema = z.number().finite().positive();

export const WaitSpecOverridesSchema = z.object({
  timeoutMs: TimeoutMsSchema.optional(),
  pollIntervalMs: PollIntervalMsSchema.optional(),
  ignoring: z.array(FailureKindSchema).optional(),
  message: z.string().min(1).optional(),
});

export const WaitSpecInputSchema = WaitSpecOverridesSchema.extend({
  timeoutMs: TimeoutMsSchema,
});

export const SessionTimeoutsSchema = z.object({
  implicitWaitMs: TimeoutMsSchema,
  pageLoadMs: TimeoutMsSchema,
});

export const WaitConfigSchema = z.object({
  defaults: WaitSpecInputSchema,
  profiles: z.record(WaitSpecOverridesSchema).default({}),
  session: SessionTimeoutsSchema.default({ implicitWaitMs: 0, pageLoadMs: 30_000 }),
});
