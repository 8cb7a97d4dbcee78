import { BaseEvent } from './base.event';
import { OrderSide, OrderType } from '../types';

export class OrderFilledEvent extends BaseEvent {
  constructor(
    public readonly orderId: string,
    public readonly assetSymbol: string,
    public readonly side: OrderSide,
    public readonly type: OrderType,
    public readonly fillPrice: string,
    public readonly fillQuantity: string,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
