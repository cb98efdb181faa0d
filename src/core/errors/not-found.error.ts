import { BaseError } from './base-error.js';

/** A booking (or other record) that does not exist; the id travels in `data`. */
export class NotFoundError extends BaseError {
  constructor(resource: string, id: string) {
    super('NOT_FOUND', 404, `${resource} not found`, { id });
  }
}
