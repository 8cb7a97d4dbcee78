import Decimal from 'decimal.js';
import { randomUUID } from 'crypto';
import {
  Amount,
  AssetId,
  AssetPair,
  OrderRequest,
} from '../../common/types';
import { BrokerError, BROKER_ERROR_CODES } from '../../common/errors';
import { FinancialDecimal, FinancialMath } from '../../common/utils';
import { Ledger } from './ledger';
import {
  OrderFilledListener,
  SimulatedBrokerConfig,
  SimulatedOrder,
} from './simulated.types';

interface Sizing {
  quantity: Decimal;
  notional: Decimal;
}

/**
 * In-process matching engine: market and limit order fills,
 * balance settlement and buying-power reservation.
 *
 * Buying power is a commitment ledger separate from settled balances:
 * placing an order reserves it, filling the order settles balances and
 * releases whatever the reservation over-estimated.
 *
 * Plain class, NOT @Injectable(). Built by SimulatedBrokerBuilder or ConnectorModule.
 */
export class SimulatedBroker {
  private readonly currency: AssetId;
  private readonly notionalAssets: ReadonlySet<AssetId>;
  private readonly ledger: Ledger;
  private readonly notionalPerUnit = new Map<string, Decimal>();
  private readonly orders = new Map<string, SimulatedOrder>();
  private readonly onOrderFilled?: OrderFilledListener;

  constructor(config: SimulatedBrokerConfig) {
    if (!config.notionalAssets.has(config.currency)) {
      throw new BrokerError(
        BROKER_ERROR_CODES.MISSING_CURRENCY_NOTIONAL_ASSET,
        `Missing currency notional asset ${config.currency}`,
        'critical',
        undefined,
        { currency: config.currency },
      );
    }
    this.currency = config.currency;
    this.notionalAssets = new Set(config.notionalAssets);
    this.ledger = new Ledger(config.startingBalances);
    this.onOrderFilled = config.onOrderFilled;
  }

  placeOrder(request: OrderRequest): string {
    const { assetPair, amount, limitPrice, side } = request;
    this.validateRequest(request);
    const sizing = this.getCurrentSizing(assetPair, amount);

    let reserveAsset: AssetId;
    let reserveAmount: Decimal;
    if (side === 'buy') {
      reserveAsset = assetPair.notionalAsset;
      reserveAmount =
        limitPrice !== null
          ? FinancialMath.notionalOf(sizing.quantity, limitPrice)
          : sizing.notional;
    } else {
      reserveAsset = assetPair.quantityAsset;
      reserveAmount = sizing.quantity;
    }

    if (this.ledger.getBuyingPower(reserveAsset).lt(reserveAmount)) {
      throw new BrokerError(
        BROKER_ERROR_CODES.INSUFFICIENT_BUYING_POWER,
        `Not enough ${reserveAsset} buying power`,
        'warning',
        undefined,
        {
          asset: reserveAsset,
          required: reserveAmount.toString(),
          available: this.ledger.getBuyingPower(reserveAsset).toString(),
        },
      );
    }

    this.ledger.updateBuyingPower(reserveAsset, reserveAmount.neg());

    const order: SimulatedOrder = {
      orderId: randomUUID(),
      assetPair,
      amount,
      limitPrice,
      filledQuantity: new FinancialDecimal(0),
      averageFillPrice: null,
      status: 'new',
      type: limitPrice !== null ? 'limit' : 'market',
      side,
    };
    this.orders.set(order.orderId, Object.freeze(order));

    if (order.type === 'market') {
      this.fill(order);
    } else {
      this.fillIfLimitReached(order);
    }

    return order.orderId;
  }

  /**
   * Records the latest price of `assetPair` and fills any pending limit
   * orders on that pair the new price satisfies.
   */
  setNotionalPerUnit(assetPair: AssetPair, price: Decimal): void {
    this.checkNotional(assetPair);
    if (!price.isFinite() || !price.gt(0)) {
      throw new BrokerError(
        BROKER_ERROR_CODES.INVALID_PRICE,
        `Price for ${assetPair.toString()} must be positive, got ${price.toString()}`,
        'error',
        undefined,
        { assetPair: assetPair.toString(), price: price.toString() },
      );
    }
    this.notionalPerUnit.set(assetPair.toString(), price);

    for (const order of [...this.orders.values()]) {
      if (
        order.status === 'new' &&
        order.type === 'limit' &&
        order.assetPair.equals(assetPair)
      ) {
        this.fillIfLimitReached(order);
      }
    }
  }

  getNotionalPerUnit(assetPair: AssetPair): Decimal {
    const price = this.findNotionalPerUnit(assetPair);
    if (price === null) {
      throw new BrokerError(
        BROKER_ERROR_CODES.NO_NOTIONAL_PER_UNIT,
        `${assetPair.toString()} does not have notional per unit`,
        'warning',
        undefined,
        { assetPair: assetPair.toString() },
      );
    }
    return price;
  }

  /** Like getNotionalPerUnit, but null for a pair that was never priced. */
  findNotionalPerUnit(assetPair: AssetPair): Decimal | null {
    this.checkNotional(assetPair);
    return this.notionalPerUnit.get(assetPair.toString()) ?? null;
  }

  getOrder(orderId: string): SimulatedOrder {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new BrokerError(
        BROKER_ERROR_CODES.ORDER_NOT_FOUND,
        `Order with id ${orderId} doesn't exist`,
        'warning',
        undefined,
        { orderId },
      );
    }
    return order;
  }

  getOrders(): SimulatedOrder[] {
    return [...this.orders.values()];
  }

  getCurrency(): AssetId {
    return this.currency;
  }

  getBalance(asset: AssetId): Decimal {
    return this.ledger.getBalance(asset);
  }

  getBuyingPower(asset: AssetId): Decimal {
    return this.ledger.getBuyingPower(asset);
  }

  /** Assets with a non-zero settled balance, the currency included. */
  getHeldAssets(): AssetId[] {
    return this.ledger.getHeldAssets();
  }

  getLedgerSnapshot(): ReturnType<Ledger['snapshot']> {
    return this.ledger.snapshot();
  }

  private fillIfLimitReached(order: SimulatedOrder): void {
    if (order.limitPrice === null) {
      return;
    }
    const current = this.getNotionalPerUnit(order.assetPair);
    const limit = order.limitPrice;

    if (
      current.eq(limit) ||
      (order.side === 'buy' && current.lt(limit)) ||
      (order.side === 'sell' && current.gt(limit))
    ) {
      this.fill(order);
    }
  }

  /** Settles `order` at the current price of its pair. */
  private fill(order: SimulatedOrder): void {
    const { quantity, notional } = this.getCurrentSizing(
      order.assetPair,
      order.amount,
    );
    const { notionalAsset, quantityAsset } = order.assetPair;

    if (order.side === 'buy') {
      this.ledger.updateBalance(notionalAsset, notional.neg());
      this.ledger.updateBalance(quantityAsset, quantity);
      this.ledger.updateBuyingPower(quantityAsset, quantity);
      if (order.limitPrice !== null) {
        // Reserved at the limit, settled at the (lower or equal) market price
        this.ledger.updateBuyingPower(
          notionalAsset,
          FinancialMath.notionalOf(quantity, order.limitPrice).minus(notional),
        );
      }
    } else {
      this.ledger.updateBalance(notionalAsset, notional);
      this.ledger.updateBuyingPower(notionalAsset, notional);
      this.ledger.updateBalance(quantityAsset, quantity.neg());
    }

    const filled: SimulatedOrder = {
      ...order,
      filledQuantity: quantity,
      averageFillPrice: notional.div(quantity),
      status: 'filled',
    };
    this.orders.set(order.orderId, Object.freeze(filled));
    this.onOrderFilled?.(filled);
  }

  private getCurrentSizing(assetPair: AssetPair, amount: Amount): Sizing {
    const price = this.getNotionalPerUnit(assetPair);
    if (amount.kind === 'quantity') {
      return {
        quantity: amount.quantity,
        notional: FinancialMath.notionalOf(amount.quantity, price),
      };
    }
    return {
      quantity: FinancialMath.quantityOf(amount.notional, price),
      notional: amount.notional,
    };
  }

  private validateRequest(request: OrderRequest): void {
    const size =
      request.amount.kind === 'quantity'
        ? request.amount.quantity
        : request.amount.notional;
    const problems: string[] = [];
    if (!size.isFinite() || !size.gt(0)) {
      problems.push(`amount must be positive, got ${size.toString()}`);
    }
    if (
      request.limitPrice !== null &&
      (!request.limitPrice.isFinite() || !request.limitPrice.gt(0))
    ) {
      problems.push(
        `limit price must be positive, got ${request.limitPrice.toString()}`,
      );
    }
    if (problems.length > 0) {
      throw new BrokerError(
        BROKER_ERROR_CODES.INVALID_ORDER,
        `Invalid order for ${request.assetPair.toString()}: ${problems.join('; ')}`,
        'error',
        undefined,
        { assetPair: request.assetPair.toString(), problems },
      );
    }
  }

  private checkNotional(assetPair: AssetPair): void {
    if (!this.notionalAssets.has(assetPair.notionalAsset)) {
      throw new BrokerError(
        BROKER_ERROR_CODES.INVALID_NOTIONAL_ASSET,
        `${assetPair.notionalAsset} is not a valid notional asset`,
        'warning',
        undefined,
        { asset: assetPair.notionalAsset },
      );
    }
  }
}

/**
 * Fluent construction of a SimulatedBroker whose currency is always
 * registered as a notional asset.
 */
export class SimulatedBrokerBuilder {
  private readonly notionalAssets: Set<AssetId>;
  private readonly balances = new Map<AssetId, Decimal>();
  private listener?: OrderFilledListener;

  constructor(private readonly currency: AssetId) {
    this.notionalAssets = new Set([currency]);
    this.balances.set(currency, new FinancialDecimal(0));
  }

  setBalance(balance: Decimal.Value): this {
    this.balances.set(this.currency, new FinancialDecimal(balance));
    return this;
  }

  addNotionalAsset(asset: AssetId, balance?: Decimal.Value): this {
    this.notionalAssets.add(asset);
    if (balance !== undefined) {
      this.balances.set(asset, new FinancialDecimal(balance));
    }
    return this;
  }

  /** Starting balance for a non-notional asset, e.g. coins already held. */
  setAssetBalance(asset: AssetId, balance: Decimal.Value): this {
    this.balances.set(asset, new FinancialDecimal(balance));
    return this;
  }

  onOrderFilled(listener: OrderFilledListener): this {
    this.listener = listener;
    return this;
  }

  build(): SimulatedBroker {
    return new SimulatedBroker({
      currency: this.currency,
      notionalAssets: this.notionalAssets,
      startingBalances: this.balances,
      onOrderFilled: this.listener,
    });
  }
}
