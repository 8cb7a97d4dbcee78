import { Account, Order, OrderRequest } from '../types';

/**
 * Trading client interface: the abstraction boundary between
 * strategies and a venue backend.
 *
 * Implemented by the simulated environment and by live environments
 * wrapping a brokerage REST client.
 */
export interface IClient {
  /** Place an order and return its venue-assigned ID. */
  placeOrder(request: OrderRequest): Promise<string>;

  /** Snapshot of every order known to the venue, in no particular order. */
  getOrders(): Promise<Order[]>;

  /** Fetch one order by ID. */
  getOrder(orderId: string): Promise<Order>;

  /** Cash, buying power and open positions in the account currency. */
  getAccount(): Promise<Account>;
}
