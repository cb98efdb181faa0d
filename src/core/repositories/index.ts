import { config } from '@config/env.config';

import { BookingRepository } from './booking.repo.js';
import type { BookingStore } from './booking.store.js';
import { InMemoryBookingRepository } from './memory-booking.repo.js';

let store: BookingStore | undefined;

/** Process-wide store chosen by BOOKING_STORE. */
export function getBookingStore(): BookingStore {
  if (!store) {
    store = config.BOOKING_STORE === 'memory' ? new InMemoryBookingRepository() : new BookingRepository();
  }
  return store;
}

export type { BookingStore } from './booking.store.js';
export { BookingRepository, InMemoryBookingRepository };
