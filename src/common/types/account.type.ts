import Decimal from 'decimal.js';
import { AssetId } from './asset-pair.type';

export interface OpenPosition {
  assetSymbol: AssetId;
  quantity: Decimal;
  averageEntryPrice: Decimal | null;
  /** Null when no price is known for the asset against the account currency. */
  marketValue: Decimal | null;
}

export interface Account {
  openPositions: Record<AssetId, OpenPosition>;
  cash: Decimal;
  currency: AssetId;
  buyingPower: Decimal;
}
