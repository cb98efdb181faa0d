import { beforeEach, describe, expect, it } from 'vitest';

import { NoAlternativeAvailableError } from '@core/errors/no-alternative.error.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import { SlotConflictError } from '@core/errors/slot-conflict.error.js';
import { ValidationError } from '@core/errors/validation.error.js';

import { createBookingHarness, type BookingHarness } from '@test/fakes/stores.js';

const date = '2030-06-02';

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected the promise to reject');
}

describe('BookingService', () => {
  let h: BookingHarness;

  beforeEach(() => {
    h = createBookingHarness();
  });

  it('books a free slot', async () => {
    const booking = await h.bookings.bookSlot('spa', date, '9:00 AM', 'delhi', { channel: 'test' });

    expect(booking.id).toMatch(/^bkg_[0-9a-f]{32}$/);
    expect(booking).toMatchObject({
      service: 'spa',
      date,
      time: '9:00 AM',
      location: 'delhi',
      meta: { channel: 'test' },
    });
    await expect(h.bookings.getBooking(booking.id)).resolves.toEqual(booking);
  });

  it('stores a null location when none is given', async () => {
    const booking = await h.bookings.bookSlot('salon', date, '10:00 AM');
    expect(booking.location).toBeNull();
  });

  it('raises a slot conflict with a suggestion', async () => {
    await h.bookings.bookSlot('spa', date, '9:00 AM');

    const err = await captureError(h.bookings.bookSlot('spa', date, '9:00 AM'));

    expect(err).toBeInstanceOf(SlotConflictError);
    if (!(err instanceof SlotConflictError)) return;
    expect(err.status).toBe(409);
    expect(err.code).toBe('SLOT_CONFLICT');
    expect(err.details).toEqual({
      service: 'spa',
      date,
      time: '9:00 AM',
      alternatives: ['10:00 AM', '11:00 AM', '4:00 PM'],
      suggestion: '10:00 AM',
    });
    await expect(h.availability.attemptResolve('spa', date, '9:00 AM')).resolves.toMatchObject({
      suggestion: '10:00 AM',
    });
  });

  it('rejects invalid input', async () => {
    await expect(h.bookings.bookSlot('spa', '2030-02-30', '9:00 AM')).rejects.toBeInstanceOf(ValidationError);
    await expect(h.bookings.bookSlot(' ', date, '9:00 AM')).rejects.toBeInstanceOf(ValidationError);
    await expect(h.bookings.bookSlot('spa', date, '')).rejects.toBeInstanceOf(ValidationError);
  });

  it('only stores canonical times or catalog labels', async () => {
    const err = await captureError(h.bookings.bookSlot('spa', date, '9am'));
    expect(err).toBeInstanceOf(ValidationError);
    if (!(err instanceof ValidationError)) return;
    expect(err.data).toEqual({ issues: ['time must be "H:MM AM/PM" or a catalog label'] });

    await expect(h.bookings.bookSlot('spa', date, 'banana')).rejects.toBeInstanceOf(ValidationError);
    await expect(h.bookings.bookSlot('travel', date, 'Morning')).resolves.toMatchObject({ time: 'Morning' });

    const booking = await h.bookings.bookSlot('spa', date, '9:00 AM');
    await expect(
      h.bookings.modifyBooking({ id: booking.id, patch: { time: '10am' } }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  describe('autoBookAlternative', () => {
    it('books the next free slot after the requested time', async () => {
      await h.bookings.bookSlot('spa', date, '9:00 AM');
      const booked = await h.bookings.autoBookAlternative('spa', date, '9:00 AM', 'mumbai');

      expect(booked).toMatchObject({ time: '10:00 AM', location: 'mumbai', meta: { autoBooked: true } });
    });

    it('fails when every slot is taken', async () => {
      await h.bookings.bookSlot('head spa', date, '10:00 AM');
      await h.bookings.bookSlot('head spa', date, '2:00 PM');

      const err = await captureError(h.bookings.autoBookAlternative('head spa', date, '10:00 AM'));
      expect(err).toBeInstanceOf(NoAlternativeAvailableError);
      if (!(err instanceof NoAlternativeAvailableError)) return;
      expect(err.code).toBe('NO_ALTERNATIVE');
      expect(err.data).toEqual({ service: 'head spa', date, nextAction: 'Try a different date or service' });
    });
  });

  describe('modifyBooking', () => {
    it('moves a booking to a free slot', async () => {
      const booking = await h.bookings.bookSlot('spa', date, '9:00 AM');
      const moved = await h.bookings.modifyBooking({ id: booking.id, patch: { time: '11:00 AM' } });

      expect(moved).toMatchObject({ id: booking.id, date, time: '11:00 AM' });
      await expect(h.availability.checkAvailability('spa', date, '9:00 AM')).resolves.toMatchObject({
        available: true,
      });
    });

    it('does not conflict with itself', async () => {
      const booking = await h.bookings.bookSlot('spa', date, '9:00 AM');
      const same = await h.bookings.modifyBooking({ id: booking.id, patch: { date } });
      expect(same.time).toBe('9:00 AM');
    });

    it('raises a conflict when the new slot is occupied', async () => {
      const booking = await h.bookings.bookSlot('spa', date, '9:00 AM');
      await h.bookings.bookSlot('spa', date, '10:00 AM');

      await expect(
        h.bookings.modifyBooking({ id: booking.id, patch: { time: '10:00 AM' } }),
      ).rejects.toBeInstanceOf(SlotConflictError);
    });

    it('rejects unknown ids and empty patches', async () => {
      await expect(
        h.bookings.modifyBooking({ id: 'bkg_missing', patch: { time: '10:00 AM' } }),
      ).rejects.toBeInstanceOf(NotFoundError);

      const booking = await h.bookings.bookSlot('spa', date, '9:00 AM');
      await expect(h.bookings.modifyBooking({ id: booking.id, patch: {} })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });

  it('cancels a booking once', async () => {
    const booking = await h.bookings.bookSlot('spa', date, '9:00 AM');
    await expect(h.bookings.cancelBooking(booking.id)).resolves.toBe(true);
    await expect(h.bookings.cancelBooking(booking.id)).resolves.toBe(false);
    await expect(h.bookings.getBooking(booking.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('frees the slot again after a cancellation', async () => {
    const booking = await h.bookings.bookSlot('salon', date, '12:00 PM');
    await expect(h.availability.checkAvailability('salon', date, '12:00 PM')).resolves.toEqual({
      available: false,
      slots: ['10:00 AM', '3:00 PM'],
    });

    await h.bookings.cancelBooking(booking.id);

    await expect(h.availability.checkAvailability('salon', date, '12:00 PM')).resolves.toEqual({
      available: true,
      slots: ['10:00 AM', '12:00 PM', '3:00 PM'],
    });
  });

  it('returns copies that do not share meta with the store', async () => {
    const booking = await h.bookings.bookSlot('spa', date, '9:00 AM', null, { source: 'chat' });
    const fetched = await h.bookings.getBooking(booking.id);
    fetched.meta.source = 'tampered';
    booking.meta.extra = true;

    expect((await h.bookings.getBooking(booking.id)).meta).toEqual({ source: 'chat' });
  });

  it('seeds demo data relative to today and resets', async () => {
    const seeded = await h.bookings.seedDemoBookings('2030-06-01');

    expect(seeded.map((b) => [b.service, b.date, b.time])).toEqual([
      ['facial + manicure', '2030-06-02', '10:00 AM'],
      ['spa', '2030-06-03', '11:00 AM'],
      ['doctor', '2030-06-04', '1:00 PM'],
    ]);
    expect(await h.bookings.listBookings()).toHaveLength(3);

    await h.bookings.resetBookings();
    expect(await h.bookings.listBookings()).toEqual([]);
  });

  it('attaches confirmation details to meta', async () => {
    const booking = await h.bookings.bookSlot('spa', date, '9:00 AM', null, { source: 'chat' });
    const updated = await h.bookings.attachMeta(booking.id, { price: 42.5 });
    expect(updated.meta).toEqual({ source: 'chat', price: 42.5 });
  });
});
