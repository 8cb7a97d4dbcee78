export { withRetry } from './with-retry';
export { FinancialMath, FinancialDecimal } from './financial-math';
