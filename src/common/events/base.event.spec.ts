import { describe, it, expect } from 'vitest';
import { BaseEvent } from './base.event';
import { OrderFilledEvent } from './broker.events';
import { withCorrelationId } from '../services/correlation-context';

class ProbeEvent extends BaseEvent {
  constructor(correlationId?: string) {
    super(correlationId);
  }
}

describe('BaseEvent', () => {
  it('should stamp the emission time', () => {
    const before = Date.now();
    const event = new ProbeEvent();

    expect(event.timestamp).toBeInstanceOf(Date);
    expect(event.timestamp.getTime()).toBeGreaterThanOrEqual(before);
  });

  it('should prefer an explicit correlationId', async () => {
    await withCorrelationId(async () => {
      expect(new ProbeEvent('tick-1').correlationId).toBe('tick-1');
    });
  });

  it('should inherit the correlationId of the async context', async () => {
    let contextId: string | undefined;
    let eventId: string | undefined;
    await withCorrelationId(async () => {
      const event = new OrderFilledEvent(
        'order-1',
        'GBP/USD',
        'buy',
        'market',
        '1.31',
        '10',
      );
      eventId = event.correlationId;
      const again = new ProbeEvent();
      contextId = again.correlationId;
    });

    expect(eventId).toBeDefined();
    expect(eventId).toBe(contextId);
  });

  it('should leave correlationId undefined outside any context', () => {
    expect(new ProbeEvent().correlationId).toBeUndefined();
  });
});
