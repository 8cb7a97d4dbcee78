export { SystemError } from './system-error';
export type { RetryStrategy } from './system-error';
export { BrokerError, BROKER_ERROR_CODES } from './broker-error';
export {
  EnvironmentError,
  ENVIRONMENT_ERROR_CODES,
} from './environment-error';
export {
  MarketDataError,
  MARKET_DATA_ERROR_CODES,
  RETRY_STRATEGIES,
} from './market-data-error';
export { ConfigValidationError } from './config-validation-error';
