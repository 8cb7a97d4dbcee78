import { IClient, IEnvironment, IMarket } from '../../common/interfaces';
import {
  Account,
  AssetPair,
  Bar,
  Order,
  OrderRequest,
} from '../../common/types';

/**
 * Pairs a venue's trading client with a market-data source.
 * Plain class, NOT @Injectable().
 */
export class LiveEnvironment implements IEnvironment {
  constructor(
    private readonly client: IClient,
    private readonly market: IMarket,
  ) {}

  // --- Trading (client) ---

  placeOrder(request: OrderRequest): Promise<string> {
    return this.client.placeOrder(request);
  }

  getOrders(): Promise<Order[]> {
    return this.client.getOrders();
  }

  getOrder(orderId: string): Promise<Order> {
    return this.client.getOrder(orderId);
  }

  getAccount(): Promise<Account> {
    return this.client.getAccount();
  }

  // --- Market data ---

  getLatestBar(assetPair: AssetPair, barDurationMs: number): Promise<Bar | null> {
    return this.market.getLatestBar(assetPair, barDurationMs);
  }
}
