import { IMarket } from '../../common/interfaces';
import { AssetPair, Bar } from '../../common/types';
import {
  MarketDataError,
  MARKET_DATA_ERROR_CODES,
  RETRY_STRATEGIES,
  RetryStrategy,
} from '../../common/errors';
import { FinancialMath, withRetry } from '../../common/utils';

export interface HttpBarMarketOptions {
  /** e.g. `https://data.example.com/v1beta3/crypto/us` */
  baseUrl: string;
  /** The only bar duration the endpoint serves. */
  barDurationMs: number;
  headers?: Record<string, string>;
  timeoutMs?: number;
  retryStrategy?: RetryStrategy;
  onRetry?: (attempt: number, error: Error) => void;
}

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * IMarket over a REST latest-bars endpoint:
 * `GET {baseUrl}/latest/bars?symbols=GBP%2FUSD` answering
 * `{ "bars": { "GBP/USD": { "o", "h", "l", "c", "t" } } }`.
 * Plain class, NOT @Injectable().
 */
export class HttpBarMarket implements IMarket {
  private readonly timeoutMs: number;
  private readonly retryStrategy: RetryStrategy;

  constructor(private readonly options: HttpBarMarketOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryStrategy = options.retryStrategy ?? RETRY_STRATEGIES.NETWORK_ERROR;
  }

  async getLatestBar(
    assetPair: AssetPair,
    barDurationMs: number,
  ): Promise<Bar | null> {
    if (barDurationMs !== this.options.barDurationMs) {
      throw new MarketDataError(
        MARKET_DATA_ERROR_CODES.UNSUPPORTED_BAR_DURATION,
        `Bar duration ${barDurationMs}ms is not supported, expected ${this.options.barDurationMs}ms`,
        'error',
        undefined,
        { barDurationMs, supported: this.options.barDurationMs },
      );
    }

    const symbol = assetPair.toString();
    const body = await withRetry(
      () => this.fetchLatestBars(symbol),
      this.retryStrategy,
      this.options.onRetry,
    );
    return parseLatestBar(body, symbol);
  }

  private async fetchLatestBars(symbol: string): Promise<unknown> {
    const url = `${this.options.baseUrl}/latest/bars?symbols=${encodeURIComponent(symbol)}`;
    const response = await fetch(url, {
      headers: { Accept: 'application/json', ...this.options.headers },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new MarketDataError(
        MARKET_DATA_ERROR_CODES.HTTP_ERROR,
        `Market data HTTP ${response.status}`,
        'error',
        this.retryStrategy,
        { url, status: response.status },
      );
    }

    const body: unknown = await response.json();
    return body;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumeric(value: unknown): value is string | number {
  return typeof value === 'number' || typeof value === 'string';
}

function schemaError(symbol: string, detail: string): MarketDataError {
  return new MarketDataError(
    MARKET_DATA_ERROR_CODES.SCHEMA_CHANGE,
    `Unexpected latest bars response for ${symbol}: ${detail}`,
    'critical',
    undefined,
    { symbol },
  );
}

function parseLatestBar(body: unknown, symbol: string): Bar | null {
  const bars = isRecord(body) ? body['bars'] : undefined;
  if (!isRecord(bars)) {
    throw schemaError(symbol, 'missing "bars" object');
  }
  const raw = bars[symbol];
  if (raw === undefined || raw === null) {
    return null;
  }
  if (!isRecord(raw)) {
    throw schemaError(symbol, 'bar is not an object');
  }

  const { o, h, l, c, t } = raw;
  if (!isNumeric(o) || !isNumeric(h) || !isNumeric(l) || !isNumeric(c)) {
    throw schemaError(symbol, 'bar prices must be numbers');
  }
  const dateTime = typeof t === 'string' ? new Date(t) : null;
  if (dateTime === null || Number.isNaN(dateTime.getTime())) {
    throw schemaError(symbol, 'bar time must be an ISO timestamp');
  }

  try {
    return {
      open: FinancialMath.parse(o, 'o'),
      high: FinancialMath.parse(h, 'h'),
      low: FinancialMath.parse(l, 'l'),
      close: FinancialMath.parse(c, 'c'),
      dateTime,
    };
  } catch (error) {
    throw schemaError(
      symbol,
      error instanceof Error ? error.message : String(error),
    );
  }
}
