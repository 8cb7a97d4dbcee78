export interface RetryStrategy {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

/**
 * Base error class for all system errors.
 * Subclasses define error code ranges:
 * - MarketDataError: 1000-1099
 * - BrokerError: 2000-2099
 * - EnvironmentError: 4000-4009
 * - ConfigValidationError: 4010
 */
export abstract class SystemError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly severity: 'critical' | 'error' | 'warning',
    public readonly retryStrategy?: RetryStrategy,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}
