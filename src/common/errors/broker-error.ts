import { SystemError, RetryStrategy } from './system-error';

/**
 * Errors raised by the simulated broker (codes 2000-2099).
 * The offending asset, pair or order id is carried in `metadata`.
 */
export class BrokerError extends SystemError {
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

export const BROKER_ERROR_CODES = {
  /** Broker currency is not one of its notional assets */
  MISSING_CURRENCY_NOTIONAL_ASSET: 2001,
  /** Pair's notional leg is not an accepted notional asset */
  INVALID_NOTIONAL_ASSET: 2002,
  /** No price has been set for the pair yet */
  NO_NOTIONAL_PER_UNIT: 2003,
  /** Reservation exceeds available buying power */
  INSUFFICIENT_BUYING_POWER: 2004,
  ORDER_NOT_FOUND: 2005,
  /** Malformed `QUANTITY/NOTIONAL` string */
  INVALID_ASSET_PAIR: 2006,
  /** Non-positive amount or limit price */
  INVALID_ORDER: 2007,
  /** Non-positive or non-finite price for a pair */
  INVALID_PRICE: 2008,
} as const;
