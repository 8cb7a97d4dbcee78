import Decimal from 'decimal.js';
import { AssetId, AssetPair } from '../../../common/types';
import { BarFixture } from '../../../connectors/simulated';

export interface ReplaySettings {
  startTime: Date;
  speed: number;
}

/** Validated simulation settings, ready to build a broker and environment from. */
export interface SimulationConfig {
  currency: AssetId;
  notionalAssets: AssetId[];
  startingBalances: Map<AssetId, Decimal>;
  pairs: AssetPair[];
  barDurationMs: number;
  refreshIntervalMs: number;
  bars: BarFixture;
  /** Null: run on wall-clock time. */
  replay: ReplaySettings | null;
}
