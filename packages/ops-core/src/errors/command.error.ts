import { BaseError } from './base.error';

/**
 * Command error - an external command (docker, sync) exited non-zero
 */
export class CommandError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'COMMAND_FAILED', 1, context);
  }
}
