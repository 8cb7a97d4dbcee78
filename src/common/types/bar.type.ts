import Decimal from 'decimal.js';

/** OHLC summary of one bar window starting at `dateTime`. */
export interface Bar {
  open: Decimal;
  high: Decimal;
  low: Decimal;
  close: Decimal;
  dateTime: Date;
}
