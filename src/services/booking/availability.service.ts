import type {
  AvailabilityCheckResult,
  NextAvailableSlot,
  OtherServiceOption,
  ResolutionResult,
} from '@core/interfaces/booking.types.js';
import { type BookingStore, getBookingStore } from '@core/repositories/index.js';

import { ANYTIME, DEFAULT_SLOT_CATALOG, type SlotCatalog, slotsFor } from './slot-catalog.js';

export class AvailabilityService {
  constructor(
    private readonly store: BookingStore = getBookingStore(),
    private readonly catalog: SlotCatalog = DEFAULT_SLOT_CATALOG,
  ) {}

  catalogFor(service: string): string[] | undefined {
    return slotsFor(this.catalog, service);
  }

  async isSlotTaken(service: string, date: string, time: string, excludeId?: string): Promise<boolean> {
    const existing = await this.store.find({ service, date, time });
    return existing.some((b) => b.id !== excludeId);
  }

  async checkAvailability(
    service: string,
    date: string,
    time?: string,
    excludeId?: string,
  ): Promise<AvailabilityCheckResult> {
    const slots = this.catalogFor(service);
    if (!slots) return { available: true, slots: [ANYTIME] };
    if (slots.includes(ANYTIME)) return { available: true, slots };
    if (!time) return { available: true, slots };

    if (await this.isSlotTaken(service, date, time, excludeId)) {
      return { available: false, slots: slots.filter((s) => s !== time) };
    }
    return { available: true, slots };
  }

  /** First free catalog entry in declared order, skipping `afterTime` itself. */
  async findNextAvailable(
    service: string,
    date: string,
    afterTime?: string,
  ): Promise<NextAvailableSlot | null> {
    const slots = this.catalogFor(service);
    if (!slots) return null;
    for (const slot of slots) {
      if (afterTime && slot === afterTime) continue;
      const booked = await this.store.find({ service, date, time: slot });
      if (booked.length === 0) {
        return { time: slot, slots };
      }
    }
    return null;
  }

  async attemptResolve(
    service: string,
    date: string,
    time: string,
    allowNearby = true,
  ): Promise<ResolutionResult> {
    const { available, slots } = await this.checkAvailability(service, date, time);
    if (available) {
      return { available: true, suggestion: time, alternatives: slots, otherOptions: [] };
    }

    const next = await this.findNextAvailable(service, date, time);
    const otherOptions: OtherServiceOption[] = [];
    if (allowNearby) {
      for (const [other, otherSlots] of Object.entries(this.catalog)) {
        if (other === service) continue;
        if (otherSlots.includes(time)) {
          otherOptions.push({ service: other, time });
        }
      }
    }

    return {
      available: false,
      suggestion: next?.time ?? null,
      alternatives: slots,
      otherOptions,
    };
  }
}
