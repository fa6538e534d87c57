import { BaseError } from './base.error';

/**
 * Raised before a mutating request reaches a read-only host
 */
export class ReadOnlyViolationError extends BaseError {
  constructor(method: string, url: string) {
    super(`Refusing ${method} ${url}: host is read-only`, 'READ_ONLY_VIOLATION', 3, { method, url });
  }
}
