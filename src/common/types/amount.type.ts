import Decimal from 'decimal.js';

/**
 * Requested order size, either in units of the quantity asset
 * or as a value in the notional asset.
 */
export type Amount =
  | { readonly kind: 'quantity'; readonly quantity: Decimal }
  | { readonly kind: 'notional'; readonly notional: Decimal };

export const Amount = {
  quantity(quantity: Decimal.Value): Amount {
    return Object.freeze({ kind: 'quantity', quantity: new Decimal(quantity) });
  },

  notional(notional: Decimal.Value): Amount {
    return Object.freeze({ kind: 'notional', notional: new Decimal(notional) });
  },
};
