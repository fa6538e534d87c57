import { BaseError } from './base.error';

/**
 * Config error - for environment values that fail schema validation
 */
export class ConfigError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', 2, context);
  }
}
