import { BrokerError, BROKER_ERROR_CODES } from '../errors/broker-error';

export type AssetId = string;

/**
 * A traded pair written as `QUANTITY/NOTIONAL`, e.g. `GBP/USD`:
 * GBP is the quantity (base) asset, USD the notional (quote) asset.
 */
export class AssetPair {
  constructor(
    public readonly quantityAsset: AssetId,
    public readonly notionalAsset: AssetId,
  ) {}

  static parse(value: string): AssetPair {
    const parts = value.split('/');
    if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
      throw new BrokerError(
        BROKER_ERROR_CODES.INVALID_ASSET_PAIR,
        `Invalid asset pair "${value}", expected QUANTITY/NOTIONAL`,
        'error',
        undefined,
        { value },
      );
    }
    return new AssetPair(parts[0], parts[1]);
  }

  equals(other: AssetPair): boolean {
    return (
      this.quantityAsset === other.quantityAsset &&
      this.notionalAsset === other.notionalAsset
    );
  }

  toString(): string {
    return `${this.quantityAsset}/${this.notionalAsset}`;
  }
}
