import type {
  Booking,
  BookingFilters,
  BookingPatch,
  NewBooking,
} from '@core/interfaces/booking.types.js';

import { toBookingRecord } from './booking.record.js';
import { type BookingStore, matchesFilters } from './booking.store.js';
import { buildDemoBookings } from './demo-bookings.js';

function copyOf(booking: Booking): Booking {
  return { ...booking, meta: { ...booking.meta } };
}

export class InMemoryBookingRepository implements BookingStore {
  private readonly records = new Map<string, Booking>();

  async create(record: NewBooking): Promise<Booking> {
    const booking = toBookingRecord(record);
    this.records.set(booking.id, copyOf(booking));
    return copyOf(booking);
  }

  async find(filters: BookingFilters = {}): Promise<Booking[]> {
    return [...this.records.values()].filter((b) => matchesFilters(b, filters)).map(copyOf);
  }

  async findById(id: string): Promise<Booking | null> {
    const found = this.records.get(id);
    return found ? copyOf(found) : null;
  }

  async update(id: string, patch: BookingPatch): Promise<Booking | null> {
    const existing = this.records.get(id);
    if (!existing) return null;
    const updated: Booking = copyOf({ ...existing, ...patch, id: existing.id });
    this.records.set(id, updated);
    return copyOf(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async listAll(): Promise<Booking[]> {
    // Map iteration order is insertion order, i.e. creation order.
    return [...this.records.values()].map(copyOf);
  }

  async resetAll(): Promise<void> {
    this.records.clear();
  }

  async seedDemoData(todayISO: string): Promise<Booking[]> {
    const created: Booking[] = [];
    for (const demo of buildDemoBookings(todayISO)) {
      created.push(await this.create(demo));
    }
    return created;
  }
}
