import { AssetPair, Bar } from '../types';

export interface IMarket {
  /**
   * Most recent bar whose window has fully closed, or null when
   * none is available yet.
   */
  getLatestBar(assetPair: AssetPair, barDurationMs: number): Promise<Bar | null>;
}
