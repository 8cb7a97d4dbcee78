import Decimal from 'decimal.js';

// Isolated Decimal constructor configured for financial precision.
// Uses Decimal.clone() to avoid mutating the global Decimal settings,
// so other modules can safely import decimal.js with their own config.
export const FinancialDecimal = Decimal.clone({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -18,
  toExpPos: 20,
});

/**
 * Pure decimal helpers for order sizing and settlement.
 * All methods use decimal.js, never native `number` for financial calculations.
 */
export class FinancialMath {
  /**
   * Midpoint of a bar's range, used as the simulated trade price.
   * Formula: (low + high) / 2
   */
  static midPrice(low: Decimal, high: Decimal): Decimal {
    FinancialMath.validateDecimalInput(low, 'low');
    FinancialMath.validateDecimalInput(high, 'high');

    return new FinancialDecimal(low).plus(high).div(2);
  }

  /**
   * Value of `quantity` units at `pricePerUnit`.
   */
  static notionalOf(quantity: Decimal, pricePerUnit: Decimal): Decimal {
    FinancialMath.validateDecimalInput(quantity, 'quantity');
    FinancialMath.validateDecimalInput(pricePerUnit, 'pricePerUnit');

    return new FinancialDecimal(quantity).mul(pricePerUnit);
  }

  /**
   * Units of the quantity asset bought by `notional` at `pricePerUnit`.
   */
  static quantityOf(notional: Decimal, pricePerUnit: Decimal): Decimal {
    FinancialMath.validateDecimalInput(notional, 'notional');
    FinancialMath.validateDecimalInput(pricePerUnit, 'pricePerUnit');

    if (pricePerUnit.isZero()) {
      throw new Error(
        'FinancialMath: pricePerUnit must not be zero (division by zero)',
      );
    }

    return new FinancialDecimal(notional).div(pricePerUnit);
  }

  /**
   * Parse a decimal string from config or an API payload.
   * Throws on anything that is not a finite number.
   */
  static parse(value: string | number, name: string): Decimal {
    let parsed: Decimal;
    try {
      parsed = new FinancialDecimal(value);
    } catch {
      throw new Error(`FinancialMath: ${name} is not a number: "${value}"`);
    }
    FinancialMath.validateDecimalInput(parsed, name);
    return parsed;
  }

  private static validateDecimalInput(value: Decimal, name: string): void {
    if (value.isNaN()) {
      throw new Error(`FinancialMath: ${name} must not be NaN`);
    }
    if (!value.isFinite()) {
      throw new Error(`FinancialMath: ${name} must not be Infinity`);
    }
  }
}
