import { BaseError } from './base.error';

/**
 * Readiness error - a dependency stayed unreachable for the whole retry budget
 */
export class ReadinessError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'READINESS_TIMEOUT', 1, context);
  }
}
