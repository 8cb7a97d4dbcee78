import Decimal from 'decimal.js';
import { IClient } from '../../common/interfaces';
import {
  Account,
  AssetPair,
  OpenPosition,
  Order,
  OrderRequest,
} from '../../common/types';
import { FinancialMath } from '../../common/utils';
import { SimulatedBroker } from './simulated-broker';
import { SimulatedOrder } from './simulated.types';

/**
 * IClient facade over a SimulatedBroker.
 * Plain class, NOT @Injectable(). Owned by a SimulatedEnvironment.
 */
export class SimulatedClient implements IClient {
  constructor(private readonly broker: SimulatedBroker) {}

  async placeOrder(request: OrderRequest): Promise<string> {
    return this.broker.placeOrder(request);
  }

  async getOrders(): Promise<Order[]> {
    return this.broker.getOrders().map(toOrder);
  }

  async getOrder(orderId: string): Promise<Order> {
    return toOrder(this.broker.getOrder(orderId));
  }

  async getAccount(): Promise<Account> {
    const currency = this.broker.getCurrency();
    const openPositions: Record<string, OpenPosition> = {};

    for (const asset of this.broker.getHeldAssets()) {
      if (asset === currency) {
        continue;
      }
      const quantity = this.broker.getBalance(asset);
      const price = this.broker.findNotionalPerUnit(
        new AssetPair(asset, currency),
      );
      openPositions[asset] = {
        assetSymbol: asset,
        quantity,
        averageEntryPrice: null,
        marketValue:
          price !== null ? FinancialMath.notionalOf(quantity, price) : null,
      };
    }

    return {
      openPositions,
      cash: this.broker.getBalance(currency),
      currency,
      buyingPower: this.broker.getBuyingPower(currency),
    };
  }

  setNotionalPerUnit(assetPair: AssetPair, price: Decimal): void {
    this.broker.setNotionalPerUnit(assetPair, price);
  }

  getBroker(): SimulatedBroker {
    return this.broker;
  }
}

function toOrder(order: SimulatedOrder): Order {
  return {
    orderId: order.orderId,
    assetSymbol: order.assetPair.toString(),
    amount: order.amount,
    limitPrice: order.limitPrice,
    filledQuantity: order.filledQuantity,
    averageFillPrice: order.averageFillPrice,
    status: order.status,
    type: order.type,
    side: order.side,
  };
}
