import { NoAlternativeAvailableError } from '@core/errors/no-alternative.error.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import { SlotConflictError } from '@core/errors/slot-conflict.error.js';
import type { Booking, BookingMeta, ModifyBookingDTO } from '@core/interfaces/booking.types.js';
import { type BookingStore, getBookingStore } from '@core/repositories/index.js';

import { AvailabilityService } from '@services/booking/availability.service.js';
import { ValidationService } from '@services/booking/validation.service.js';

import { logger } from '@utils/logger.js';

export class BookingService {
  constructor(
    private readonly store: BookingStore = getBookingStore(),
    private readonly availabilityService = new AvailabilityService(store),
    private readonly validationService = new ValidationService(),
  ) {}

  async bookSlot(
    service: string,
    date: string,
    time: string,
    location?: string | null,
    meta: BookingMeta = {},
  ): Promise<Booking> {
    this.validationService.validateSlot({ service, date, time }, location);

    const avail = await this.availabilityService.checkAvailability(service, date, time);
    if (!avail.available) {
      const next = await this.availabilityService.findNextAvailable(service, date, time);
      logger.info('[booking] conflict', { service, date, time, suggestion: next?.time ?? null });
      throw new SlotConflictError({
        service,
        date,
        time,
        alternatives: avail.slots,
        suggestion: next?.time ?? null,
      });
    }

    const created = await this.store.create({ service, date, time, location: location ?? null, meta });
    logger.info('[booking] created', { id: created.id, service, date, time });
    return created;
  }

  async autoBookAlternative(
    service: string,
    date: string,
    time?: string,
    location?: string | null,
    meta: BookingMeta = {},
  ): Promise<Booking> {
    const next = await this.availabilityService.findNextAvailable(service, date, time);
    if (!next) {
      logger.warn('[booking] no alternative', { service, date, time });
      throw new NoAlternativeAvailableError(service, date);
    }
    return this.bookSlot(service, date, next.time, location, { ...meta, autoBooked: true });
  }

  async modifyBooking(dto: ModifyBookingDTO): Promise<Booking> {
    const existing = await this.store.findById(dto.id);
    if (!existing) throw new NotFoundError('Booking', dto.id);
    this.validationService.validateModify(dto);

    const date = dto.patch.date ?? existing.date;
    const time = dto.patch.time ?? existing.time;

    const avail = await this.availabilityService.checkAvailability(
      existing.service,
      date,
      time,
      existing.id,
    );
    if (!avail.available) {
      const next = await this.availabilityService.findNextAvailable(existing.service, date, time);
      throw new SlotConflictError({
        service: existing.service,
        date,
        time,
        alternatives: avail.slots,
        suggestion: next?.time ?? null,
      });
    }

    const updated = await this.store.update(existing.id, { date, time });
    if (!updated) throw new NotFoundError('Booking', dto.id);
    logger.info('[booking] modified', { id: updated.id, date, time });
    return updated;
  }

  async attachMeta(id: string, meta: BookingMeta): Promise<Booking> {
    const existing = await this.store.findById(id);
    if (!existing) throw new NotFoundError('Booking', id);
    const updated = await this.store.update(id, { meta: { ...existing.meta, ...meta } });
    if (!updated) throw new NotFoundError('Booking', id);
    return updated;
  }

  async cancelBooking(id: string): Promise<boolean> {
    const removed = await this.store.delete(id);
    if (removed) logger.info('[booking] cancelled', { id });
    return removed;
  }

  async listBookings(): Promise<Booking[]> {
    return this.store.listAll();
  }

  async getBooking(id: string): Promise<Booking> {
    const booking = await this.store.findById(id);
    if (!booking) throw new NotFoundError('Booking', id);
    return booking;
  }

  async resetBookings(): Promise<void> {
    await this.store.resetAll();
    logger.warn('[booking] store reset');
  }

  async seedDemoBookings(todayISO: string): Promise<Booking[]> {
    const seeded = await this.store.seedDemoData(todayISO);
    logger.info('[booking] demo data seeded', { count: seeded.length });
    return seeded;
  }
}
