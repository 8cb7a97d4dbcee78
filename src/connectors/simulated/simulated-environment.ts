import { IBarDataSource, IClock, IEnvironment } from '../../common/interfaces';
import {
  Account,
  AssetPair,
  Bar,
  Order,
  OrderRequest,
} from '../../common/types';
import {
  EnvironmentError,
  ENVIRONMENT_ERROR_CODES,
} from '../../common/errors';
import { FinancialMath } from '../../common/utils';
import { SimulatedBroker } from './simulated-broker';
import { SimulatedClient } from './simulated-client';
import {
  DEFAULT_BAR_DURATION_MS,
  DEFAULT_REFRESH_INTERVAL_MS,
} from './simulated.types';

/** Time and data the simulation replays against. */
export interface SimulatedContext {
  clock: IClock;
  barDataSource: IBarDataSource;
}

export interface SimulatedEnvironmentOptions {
  pairs: readonly AssetPair[];
  barDurationMs?: number;
  refreshIntervalMs?: number;
}

/**
 * Time-stepped simulation: walks from the last processed time to the
 * clock's now in `refreshIntervalMs` steps, pricing every tracked pair at
 * the mid of its bar so pending limit orders see each intermediate price.
 *
 * Plain class, NOT @Injectable(). Built by SimulatedEnvironmentBuilder or ConnectorModule.
 */
export class SimulatedEnvironment implements IEnvironment {
  private lastProcessedTime: Date | null = null;
  private readonly pairs: readonly AssetPair[];
  private readonly barDurationMs: number;
  private readonly refreshIntervalMs: number;

  constructor(
    private readonly context: SimulatedContext,
    private readonly client: SimulatedClient,
    options: SimulatedEnvironmentOptions,
  ) {
    this.pairs = [...options.pairs];
    this.barDurationMs = options.barDurationMs ?? DEFAULT_BAR_DURATION_MS;
    this.refreshIntervalMs =
      options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    if (!(this.refreshIntervalMs > 0)) {
      throw new RangeError(
        `refreshIntervalMs must be positive, got ${this.refreshIntervalMs}`,
      );
    }
  }

  init(): void {
    if (this.lastProcessedTime !== null) {
      throw new EnvironmentError(
        ENVIRONMENT_ERROR_CODES.ALREADY_INITIALIZED,
        'Environment already initialized',
      );
    }
    this.lastProcessedTime = this.context.clock.now();
    this.update();
  }

  /**
   * Catches the broker up to the clock. Returns the simulated time reached.
   */
  update(): Date {
    const from = this.requireInitialized();
    const now = this.context.clock.now();

    // Every pass reads bars at `now`; a clock set backwards runs no pass.
    let t = from.getTime();
    while (t <= now.getTime()) {
      this.priceTrackedPairs(now);
      if (t === now.getTime()) {
        break;
      }
      t = Math.min(t + this.refreshIntervalMs, now.getTime());
    }

    this.lastProcessedTime = now;
    return this.lastProcessedTime;
  }

  isInitialized(): boolean {
    return this.lastProcessedTime !== null;
  }

  getLastProcessedTime(): Date | null {
    return this.lastProcessedTime;
  }

  getTrackedPairs(): readonly AssetPair[] {
    return this.pairs;
  }

  getBarDurationMs(): number {
    return this.barDurationMs;
  }

  getRefreshIntervalMs(): number {
    return this.refreshIntervalMs;
  }

  getClient(): SimulatedClient {
    return this.client;
  }

  async placeOrder(request: OrderRequest): Promise<string> {
    this.update();
    return this.client.placeOrder(request);
  }

  async getOrders(): Promise<Order[]> {
    this.update();
    return this.client.getOrders();
  }

  async getOrder(orderId: string): Promise<Order> {
    this.update();
    return this.client.getOrder(orderId);
  }

  async getAccount(): Promise<Account> {
    this.update();
    return this.client.getAccount();
  }

  /**
   * Latest bar that has fully closed at the clock's now. A bar still
   * forming is skipped in favour of the one a full duration earlier.
   */
  async getLatestBar(
    assetPair: AssetPair,
    barDurationMs: number,
  ): Promise<Bar | null> {
    this.requireInitialized();
    const now = this.context.clock.now();
    const bar = this.context.barDataSource.getBar(assetPair, now, barDurationMs);

    if (bar && bar.dateTime.getTime() + barDurationMs > now.getTime()) {
      return this.context.barDataSource.getBar(
        assetPair,
        new Date(now.getTime() - barDurationMs),
        barDurationMs,
      );
    }
    return bar;
  }

  private priceTrackedPairs(at: Date): void {
    for (const pair of this.pairs) {
      const bar = this.context.barDataSource.getBar(pair, at, this.barDurationMs);
      if (bar) {
        this.client.setNotionalPerUnit(
          pair,
          FinancialMath.midPrice(bar.low, bar.high),
        );
      }
    }
  }

  private requireInitialized(): Date {
    if (this.lastProcessedTime === null) {
      throw new EnvironmentError(
        ENVIRONMENT_ERROR_CODES.NOT_INITIALIZED,
        'Environment not initialized, call init() first',
      );
    }
    return this.lastProcessedTime;
  }
}

/**
 * Assembles a broker, client and environment around a context.
 */
export class SimulatedEnvironmentBuilder {
  private readonly pairs: AssetPair[] = [];
  private barDurationMs = DEFAULT_BAR_DURATION_MS;
  private refreshIntervalMs = DEFAULT_REFRESH_INTERVAL_MS;

  constructor(
    private readonly context: SimulatedContext,
    private readonly broker: SimulatedBroker,
  ) {}

  addPair(assetPair: AssetPair): this {
    if (!this.pairs.some((pair) => pair.equals(assetPair))) {
      this.pairs.push(assetPair);
    }
    return this;
  }

  setBarDuration(ms: number): this {
    this.barDurationMs = ms;
    return this;
  }

  setRefreshInterval(ms: number): this {
    this.refreshIntervalMs = ms;
    return this;
  }

  build(): SimulatedEnvironment {
    return new SimulatedEnvironment(
      this.context,
      new SimulatedClient(this.broker),
      {
        pairs: this.pairs,
        barDurationMs: this.barDurationMs,
        refreshIntervalMs: this.refreshIntervalMs,
      },
    );
  }
}
