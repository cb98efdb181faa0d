import type {
  Booking,
  BookingFilters,
  BookingPatch,
  NewBooking,
} from '@core/interfaces/booking.types.js';

import { connectRedis, redis } from '@infra/redis/redis.client.js';
import { redisConfig } from '@infra/redis/redis.config.js';

import { logger } from '@utils/logger.js';

import { parseBookingRecord, toBookingRecord } from './booking.record.js';
import { type BookingStore, byCreatedAt, matchesFilters } from './booking.store.js';
import { buildDemoBookings } from './demo-bookings.js';

/** Bookings kept as JSON values in a single redis hash keyed by booking id. */
export class BookingRepository implements BookingStore {
  constructor(private readonly key: string = redisConfig.prefixes.bookings) {}

  async create(record: NewBooking): Promise<Booking> {
    await connectRedis();
    const booking = toBookingRecord(record);
    await redis.hSet(this.key, booking.id, JSON.stringify(booking));
    return booking;
  }

  async find(filters: BookingFilters = {}): Promise<Booking[]> {
    const all = await this.listAll();
    return all.filter((b) => matchesFilters(b, filters));
  }

  async findById(id: string): Promise<Booking | null> {
    await connectRedis();
    const raw = await redis.hGet(this.key, id);
    return raw ? parseBookingRecord(raw) : null;
  }

  async update(id: string, patch: BookingPatch): Promise<Booking | null> {
    const existing = await this.findById(id);
    if (!existing) return null;
    const updated: Booking = { ...existing, ...patch, id: existing.id };
    await redis.hSet(this.key, id, JSON.stringify(updated));
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    await connectRedis();
    const removed = await redis.hDel(this.key, id);
    return removed > 0;
  }

  async listAll(): Promise<Booking[]> {
    await connectRedis();
    const values = await redis.hVals(this.key);
    const bookings: Booking[] = [];
    for (const raw of values) {
      const parsed = parseBookingRecord(raw);
      if (parsed) {
        bookings.push(parsed);
      } else {
        logger.warn('[bookings] skipping unreadable record', { key: this.key });
      }
    }
    return bookings.sort(byCreatedAt);
  }

  async resetAll(): Promise<void> {
    await connectRedis();
    await redis.del(this.key);
  }

  async seedDemoData(todayISO: string): Promise<Booking[]> {
    const created: Booking[] = [];
    for (const demo of buildDemoBookings(todayISO)) {
      created.push(await this.create(demo));
    }
    return created;
  }
}
