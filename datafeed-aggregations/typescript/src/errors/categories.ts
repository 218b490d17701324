import { DatafeedError } from './error.js';

/**
 * Error thrown when the supplied aggregation or interval configuration is
 * invalid or unsupported. The caller fixes the configuration and resubmits.
 */
export class ConfigurationError extends DatafeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'configuration_error',
      message,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the validator is handed a node shape that prior
 * validation should have ruled out. Signals an integration bug.
 */
export class InvalidStateError extends DatafeedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'invalid_state_error',
      message,
      details,
    });
    this.name = 'InvalidStateError';
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isInvalidStateError(error: unknown): error is InvalidStateError {
  return error instanceof InvalidStateError;
}
