import Decimal from 'decimal.js';
import { AssetId } from '../../common/types';
import { FinancialDecimal } from '../../common/utils';

const ZERO = new FinancialDecimal(0);

export interface LedgerSnapshot {
  balances: Record<AssetId, string>;
  buyingPower: Record<AssetId, string>;
}

/**
 * Per-asset settled balances and buying power.
 * Unseen assets read as zero; updates are additive and create the entry on first write.
 * Plain class, NOT @Injectable(). One instance per SimulatedBroker.
 */
export class Ledger {
  private readonly balances = new Map<AssetId, Decimal>();
  private readonly buyingPower = new Map<AssetId, Decimal>();

  constructor(startingBalances: ReadonlyMap<AssetId, Decimal> = new Map()) {
    for (const [asset, balance] of startingBalances) {
      this.balances.set(asset, balance);
      this.buyingPower.set(asset, balance);
    }
  }

  getBalance(asset: AssetId): Decimal {
    return this.balances.get(asset) ?? ZERO;
  }

  getBuyingPower(asset: AssetId): Decimal {
    return this.buyingPower.get(asset) ?? ZERO;
  }

  updateBalance(asset: AssetId, delta: Decimal): void {
    this.balances.set(asset, this.getBalance(asset).plus(delta));
  }

  updateBuyingPower(asset: AssetId, delta: Decimal): void {
    this.buyingPower.set(asset, this.getBuyingPower(asset).plus(delta));
  }

  /** Assets whose settled balance is non-zero. */
  getHeldAssets(): AssetId[] {
    return [...this.balances]
      .filter(([, balance]) => !balance.isZero())
      .map(([asset]) => asset);
  }

  snapshot(): LedgerSnapshot {
    return {
      balances: toRecord(this.balances),
      buyingPower: toRecord(this.buyingPower),
    };
  }
}

function toRecord(values: Map<AssetId, Decimal>): Record<AssetId, string> {
  const record: Record<AssetId, string> = {};
  for (const [asset, value] of values) {
    record[asset] = value.toString();
  }
  return record;
}
