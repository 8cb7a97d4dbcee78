import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { AssetPair } from './asset-pair.type';

const assetArb = fc.stringMatching(/^[A-Z0-9]{1,8}$/);

describe('AssetPair property tests', () => {
  it('parse and toString round-trip', () => {
    fc.assert(
      fc.property(assetArb, assetArb, (quantityAsset, notionalAsset) => {
        const text = `${quantityAsset}/${notionalAsset}`;
        const pair = AssetPair.parse(text);

        expect(pair.toString()).toBe(text);
        expect(pair.quantityAsset).toBe(quantityAsset);
        expect(pair.notionalAsset).toBe(notionalAsset);
      }),
    );
  });

  it('equals holds exactly when both legs match', () => {
    fc.assert(
      fc.property(assetArb, assetArb, assetArb, (a, b, c) => {
        const pair = AssetPair.parse(`${a}/${b}`);

        expect(pair.equals(AssetPair.parse(`${a}/${b}`))).toBe(true);
        expect(pair.equals(AssetPair.parse(`${a}/${c}`))).toBe(b === c);
      }),
    );
  });
});
