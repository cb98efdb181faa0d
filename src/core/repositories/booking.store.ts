import type {
  Booking,
  BookingFilters,
  BookingPatch,
  NewBooking,
} from '@core/interfaces/booking.types.js';

/**
 * Durable list of booking records. Filters are field equality; an omitted
 * filter key matches every record.
 */
export interface BookingStore {
  create(record: NewBooking): Promise<Booking>;
  find(filters?: BookingFilters): Promise<Booking[]>;
  findById(id: string): Promise<Booking | null>;
  update(id: string, patch: BookingPatch): Promise<Booking | null>;
  delete(id: string): Promise<boolean>;
  /** Every record, oldest first. */
  listAll(): Promise<Booking[]>;
  resetAll(): Promise<void>;
  seedDemoData(todayISO: string): Promise<Booking[]>;
}

const FILTER_KEYS = ['service', 'date', 'time', 'location'] as const;

export function matchesFilters(booking: Booking, filters: BookingFilters = {}): boolean {
  return FILTER_KEYS.every((key) => {
    const expected = filters[key];
    return expected === undefined || booking[key] === expected;
  });
}

export function byCreatedAt(a: Booking, b: Booking): number {
  if (a.createdAt === b.createdAt) return 0;
  return a.createdAt < b.createdAt ? -1 : 1;
}
