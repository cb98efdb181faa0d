import { BaseError } from './base-error.js';

export interface SlotConflictDetails {
  service: string;
  date: string;
  time: string;
  alternatives: string[];
  suggestion: string | null;
}

export class SlotConflictError extends BaseError {
  constructor(
    public readonly details: SlotConflictDetails,
    message = 'Requested time is not available',
  ) {
    super('SLOT_CONFLICT', 409, message, details);
  }
}
