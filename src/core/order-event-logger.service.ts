import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  EVENT_NAMES,
  EnvironmentUpdatedEvent,
  EnvironmentUpdateFailedEvent,
  OrderFilledEvent,
} from '../common/events';

/** Writes simulation domain events to the structured log. */
@Injectable()
export class OrderEventLoggerService {
  private readonly logger = new Logger(OrderEventLoggerService.name);

  @OnEvent(EVENT_NAMES.ORDER_FILLED)
  handleOrderFilled(event: OrderFilledEvent): void {
    this.logger.log({
      message: `Order filled: ${event.side} ${event.fillQuantity} ${event.assetSymbol} @ ${event.fillPrice}`,
      timestamp: event.timestamp.toISOString(),
      module: 'broker',
      correlationId: event.correlationId,
      data: {
        orderId: event.orderId,
        assetSymbol: event.assetSymbol,
        side: event.side,
        type: event.type,
        fillPrice: event.fillPrice,
        fillQuantity: event.fillQuantity,
      },
    });
  }

  @OnEvent(EVENT_NAMES.ENVIRONMENT_UPDATED)
  handleEnvironmentUpdated(event: EnvironmentUpdatedEvent): void {
    this.logger.debug({
      message: 'Environment updated',
      timestamp: event.timestamp.toISOString(),
      module: 'simulation',
      correlationId: event.correlationId,
      data: {
        simulatedTime: event.simulatedTime.toISOString(),
        trackedPairs: event.trackedPairs,
      },
    });
  }

  @OnEvent(EVENT_NAMES.ENVIRONMENT_UPDATE_FAILED)
  handleEnvironmentUpdateFailed(event: EnvironmentUpdateFailedEvent): void {
    this.logger.warn({
      message: `Environment update failed: ${event.reason}`,
      timestamp: event.timestamp.toISOString(),
      module: 'simulation',
      correlationId: event.correlationId,
      data: { code: event.reasonCode },
    });
  }
}
