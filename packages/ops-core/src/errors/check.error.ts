import { BaseError } from './base.error';

/**
 * Check failed - a service answered but broke its contract
 */
export class CheckFailedError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CHECK_FAILED', 1, context);
  }
}
