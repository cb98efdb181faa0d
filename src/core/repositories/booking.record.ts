import { randomBytes } from 'crypto';

import { z } from 'zod';

import type { Booking, NewBooking } from '@core/interfaces/booking.types.js';

import { utcNowISO } from '@utils/time.js';

export const BookingRecordSchema = z.object({
  id: z.string().min(1),
  service: z.string(),
  date: z.string(),
  time: z.string(),
  location: z.string().nullable(),
  createdAt: z.string(),
  meta: z.record(z.unknown()),
});

export function generateBookingId(): string {
  return `bkg_${randomBytes(16).toString('hex')}`;
}

export function toBookingRecord(input: NewBooking): Booking {
  return {
    id: generateBookingId(),
    service: input.service,
    date: input.date,
    time: input.time,
    location: input.location ?? null,
    createdAt: utcNowISO(),
    meta: { ...(input.meta ?? {}) },
  };
}

export function parseBookingRecord(raw: string): Booking | null {
  try {
    const parsed = BookingRecordSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
