import type { Booking, NewBooking } from '@core/interfaces/index.js';
import { InMemoryBookingRepository } from '@core/repositories/memory-booking.repo.js';

import { AvailabilityService } from '@services/booking/availability.service.js';
import { BookingService } from '@services/booking/booking.service.js';

export interface BookingHarness {
  store: InMemoryBookingRepository;
  availability: AvailabilityService;
  bookings: BookingService;
  add(record: NewBooking): Promise<Booking>;
}

/** Fresh services sharing one in-memory store. */
export function createBookingHarness(): BookingHarness {
  const store = new InMemoryBookingRepository();
  const availability = new AvailabilityService(store);
  return {
    store,
    availability,
    bookings: new BookingService(store, availability),
    add: (record) => store.create(record),
  };
}
