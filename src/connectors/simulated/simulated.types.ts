import Decimal from 'decimal.js';
import {
  Amount,
  AssetId,
  AssetPair,
  OrderSide,
  OrderType,
} from '../../common/types';

/**
 * Order as held in the broker's order table.
 * Replaced by a new frozen value on fill, never mutated in place.
 */
export interface SimulatedOrder {
  readonly orderId: string;
  readonly assetPair: AssetPair;
  readonly amount: Amount;
  readonly limitPrice: Decimal | null;
  readonly filledQuantity: Decimal;
  readonly averageFillPrice: Decimal | null;
  readonly status: 'new' | 'filled';
  readonly type: OrderType;
  readonly side: OrderSide;
}

export type OrderFilledListener = (order: SimulatedOrder) => void;

export interface SimulatedBrokerConfig {
  /** Settlement currency; must be one of `notionalAssets`. */
  currency: AssetId;
  notionalAssets: ReadonlySet<AssetId>;
  startingBalances: ReadonlyMap<AssetId, Decimal>;
  onOrderFilled?: OrderFilledListener;
}

/** Defaults used when the environment is built without explicit timings. */
export const DEFAULT_BAR_DURATION_MS = 60_000;
export const DEFAULT_REFRESH_INTERVAL_MS = 30_000;
