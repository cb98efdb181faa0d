import { z } from 'zod';

import { ValidationError } from '@core/errors/validation.error.js';

import { toSlotTime } from '@services/booking/slot-catalog.js';

import { isISODate } from '@utils/time.js';

const isoDate = z.string().refine(isISODate, 'must be a yyyy-MM-dd date');
const service = z.string().trim().min(1).max(40).transform((s) => s.toLowerCase());
const time = z
  .string()
  .trim()
  .min(1)
  .max(20)
  .transform((value, ctx) => {
    const slot = toSlotTime(value);
    if (!slot) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a time such as 9:30 AM or a catalog label' });
      return z.NEVER;
    }
    return slot;
  });
const location = z.string().trim().min(1).max(80).nullish();
const meta = z.record(z.unknown());

export const TurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string().max(2000),
});

export const ExtractBodySchema = z.object({
  turns: z.array(TurnSchema).min(1).max(100),
  today: isoDate.optional(),
});

export const TurnBodySchema = ExtractBodySchema.extend({
  confirm: z.boolean().optional(),
  acceptSuggestion: z.boolean().optional(),
  meta: meta.optional(),
});

export const AvailabilityQuerySchema = z.object({
  service,
  date: isoDate,
  time: time.optional(),
});

export const NextAvailableQuerySchema = z.object({
  service,
  date: isoDate,
  after: time.optional(),
});

export const ResolveQuerySchema = z.object({
  service,
  date: isoDate,
  time,
  allowNearby: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => v !== 'false'),
});

export const CreateBookingBodySchema = z.object({
  service,
  date: isoDate,
  time,
  location,
  meta: meta.optional(),
});

export const AutoBookingBodySchema = CreateBookingBodySchema.extend({
  time: time.optional(),
});

export const ModifyBookingBodySchema = z.object({
  date: isoDate.optional(),
  time: time.optional(),
});

export const QuoteBodySchema = z.object({
  service,
  confidencePct: z.number().min(0).max(100),
  meta: meta.optional(),
  location,
});

export const SeedBodySchema = z.object({
  today: isoDate.optional(),
});

/** Parses `input` or throws a ValidationError listing every issue. */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
    throw new ValidationError('Invalid request', issues);
  }
  return parsed.data;
}
