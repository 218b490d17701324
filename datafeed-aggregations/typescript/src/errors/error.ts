/**
 * Base error class for all datafeed aggregation errors.
 * Carries a machine-readable error type and optional structured details
 * describing the offending configuration.
 */
export class DatafeedError extends Error {
  /**
   * The type of error (e.g., 'configuration_error', 'invalid_state_error')
   */
  public readonly type: string;

  /**
   * Additional details about the rejected input
   */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    type: string;
    message: string;
    details?: Record<string, unknown>;
  }) {
    super(options.message);
    this.name = 'DatafeedError';
    this.type = options.type;
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Validation failures are deterministic; retrying the same input fails the same way.
   */
  get isRetryable(): boolean {
    return false;
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      details: this.details,
    };
  }
}
