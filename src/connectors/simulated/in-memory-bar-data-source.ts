import { IBarDataSource } from '../../common/interfaces';
import { AssetPair, Bar } from '../../common/types';
import {
  MarketDataError,
  MARKET_DATA_ERROR_CODES,
} from '../../common/errors';
import { FinancialMath } from '../../common/utils';

/** One bar as stored in a JSON fixture; prices are decimal strings or numbers. */
export interface BarRecord {
  dateTime: string;
  open: string | number;
  high: string | number;
  low: string | number;
  close: string | number;
}

/** `{ "GBP/USD": [BarRecord, ...] }` */
export type BarFixture = Record<string, readonly BarRecord[]>;

/**
 * Bars held in memory per (pair, duration), sorted by start time.
 * `getBar` returns the latest bar that started at or before `at`.
 */
export class InMemoryBarDataSource implements IBarDataSource {
  private readonly series = new Map<string, Bar[]>();

  static fromJson(
    fixture: BarFixture,
    barDurationMs: number,
  ): InMemoryBarDataSource {
    const source = new InMemoryBarDataSource();
    for (const [symbol, records] of Object.entries(fixture)) {
      source.addBars(
        AssetPair.parse(symbol),
        barDurationMs,
        records.map((record, index) => parseBar(symbol, index, record)),
      );
    }
    return source;
  }

  addBars(assetPair: AssetPair, barDurationMs: number, bars: readonly Bar[]): void {
    const key = seriesKey(assetPair, barDurationMs);
    const merged = [...(this.series.get(key) ?? []), ...bars];
    merged.sort((a, b) => a.dateTime.getTime() - b.dateTime.getTime());
    this.series.set(key, merged);
  }

  getBar(assetPair: AssetPair, at: Date, barDurationMs: number): Bar | null {
    const bars = this.series.get(seriesKey(assetPair, barDurationMs));
    if (!bars) {
      return null;
    }

    // Last index whose dateTime <= at
    const target = at.getTime();
    let lo = 0;
    let hi = bars.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (bars[mid].dateTime.getTime() <= target) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found >= 0 ? bars[found] : null;
  }
}

function seriesKey(assetPair: AssetPair, barDurationMs: number): string {
  return `${assetPair.toString()}@${barDurationMs}`;
}

function parseBar(symbol: string, index: number, record: BarRecord): Bar {
  const at = `${symbol}[${index}]`;
  const dateTime = new Date(record.dateTime);
  if (Number.isNaN(dateTime.getTime())) {
    throw new MarketDataError(
      MARKET_DATA_ERROR_CODES.SCHEMA_CHANGE,
      `Bar ${at} has an invalid dateTime "${record.dateTime}"`,
      'critical',
      undefined,
      { symbol, index },
    );
  }
  try {
    return {
      open: FinancialMath.parse(record.open, `${at}.open`),
      high: FinancialMath.parse(record.high, `${at}.high`),
      low: FinancialMath.parse(record.low, `${at}.low`),
      close: FinancialMath.parse(record.close, `${at}.close`),
      dateTime,
    };
  } catch (error) {
    throw new MarketDataError(
      MARKET_DATA_ERROR_CODES.SCHEMA_CHANGE,
      error instanceof Error ? error.message : String(error),
      'critical',
      undefined,
      { symbol, index },
    );
  }
}
