import { AssetPair, Bar } from '../types';

/**
 * Historical bar lookup driving the simulated environment.
 * Implementations return the bar in effect at `at`, or null when none exists.
 */
export interface IBarDataSource {
  getBar(assetPair: AssetPair, at: Date, barDurationMs: number): Bar | null;
}
