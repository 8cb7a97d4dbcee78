import { RetryStrategy, SystemError } from './system-error';

/**
 * Error class for market data API errors (code range 1000-1099).
 *
 * - 1001: HTTP error status (ERROR, network backoff)
 * - 1002: Malformed response body (CRITICAL, no retry)
 * - 1003: Requested bar duration not served (ERROR, no retry)
 */
export class MarketDataError extends SystemError {
  constructor(
    code: number,
    message: string,
    severity: 'critical' | 'error' | 'warning',
    retryStrategy?: RetryStrategy,
    metadata?: Record<string, unknown>,
  ) {
    super(code, message, severity, retryStrategy, metadata);
  }
}

export const MARKET_DATA_ERROR_CODES = {
  HTTP_ERROR: 1001,
  SCHEMA_CHANGE: 1002,
  UNSUPPORTED_BAR_DURATION: 1003,
} as const;

export const RETRY_STRATEGIES = {
  NETWORK_ERROR: {
    maxRetries: 3,
    initialDelayMs: 500,
    maxDelayMs: 5000,
    backoffMultiplier: 2,
  },
} as const satisfies Record<string, RetryStrategy>;
