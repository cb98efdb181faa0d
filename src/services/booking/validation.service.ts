import { ValidationError } from '@core/errors/validation.error.js';
import type { ModifyBookingDTO } from '@core/interfaces/booking.types.js';

import { isSlotTime } from '@services/booking/slot-catalog.js';

import { isISODate } from '@utils/time.js';

const TIME_FORMAT_ISSUE = 'time must be "H:MM AM/PM" or a catalog label';

export interface SlotRequest {
  service: string;
  date: string;
  time: string;
}

export class ValidationService {
  private readonly maxLocationLength = 80;

  validateSlot(input: SlotRequest, location?: string | null): void {
    const issues: string[] = [];
    if (!input.service?.trim()) issues.push('service is required');
    if (!isISODate(input.date)) issues.push('date must be a valid yyyy-MM-dd date');
    if (!input.time?.trim()) issues.push('time is required');
    else if (!isSlotTime(input.time)) issues.push(TIME_FORMAT_ISSUE);
    if (location && location.length > this.maxLocationLength) {
      issues.push(`location must be at most ${this.maxLocationLength} characters`);
    }
    if (issues.length) throw new ValidationError('Invalid booking request', issues);
  }

  validateModify(dto: ModifyBookingDTO): void {
    const { date, time } = dto.patch;
    if (date === undefined && time === undefined) {
      throw new ValidationError('Nothing to modify: provide a new date or time');
    }
    if (date !== undefined && !isISODate(date)) {
      throw new ValidationError('Invalid booking request', ['date must be a valid yyyy-MM-dd date']);
    }
    if (time !== undefined && !time.trim()) {
      throw new ValidationError('Invalid booking request', ['time is required']);
    }
    if (time !== undefined && !isSlotTime(time)) {
      throw new ValidationError('Invalid booking request', [TIME_FORMAT_ISSUE]);
    }
  }
}
