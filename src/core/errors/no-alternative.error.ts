import { BaseError } from './base-error.js';

export class NoAlternativeAvailableError extends BaseError {
  constructor(service: string, date: string) {
    super('NO_ALTERNATIVE', 409, 'No alternative slots available', {
      service,
      date,
      nextAction: 'Try a different date or service',
    });
  }
}
