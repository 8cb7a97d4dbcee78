import Decimal from 'decimal.js';
import { Amount } from './amount.type';
import { AssetPair } from './asset-pair.type';

export type OrderSide = 'buy' | 'sell';
export type OrderType = 'market' | 'limit';

/**
 * `partially_filled` and `expired` only come from live venues;
 * the simulator moves orders from `new` straight to `filled`.
 */
export type OrderStatus = 'new' | 'partially_filled' | 'filled' | 'expired';

export interface OrderRequest {
  assetPair: AssetPair;
  amount: Amount;
  limitPrice: Decimal | null;
  side: OrderSide;
}

export const OrderRequests = {
  marketBuy(assetPair: AssetPair, amount: Amount): OrderRequest {
    return { assetPair, amount, limitPrice: null, side: 'buy' };
  },

  marketSell(assetPair: AssetPair, amount: Amount): OrderRequest {
    return { assetPair, amount, limitPrice: null, side: 'sell' };
  },

  limitBuy(
    assetPair: AssetPair,
    amount: Amount,
    limitPrice: Decimal.Value,
  ): OrderRequest {
    return {
      assetPair,
      amount,
      limitPrice: new Decimal(limitPrice),
      side: 'buy',
    };
  },

  limitSell(
    assetPair: AssetPair,
    amount: Amount,
    limitPrice: Decimal.Value,
  ): OrderRequest {
    return {
      assetPair,
      amount,
      limitPrice: new Decimal(limitPrice),
      side: 'sell',
    };
  },
};

/** Order as reported through the generic client API. */
export interface Order {
  orderId: string;
  assetSymbol: string;
  amount: Amount;
  limitPrice: Decimal | null;
  filledQuantity: Decimal;
  averageFillPrice: Decimal | null;
  status: OrderStatus;
  type: OrderType;
  side: OrderSide;
}
