import { getCorrelationId } from '../services/correlation-context';

/**
 * Base class for all domain events.
 * Carries the wall-clock emission time and the correlation ID of the
 * scheduler tick or caller that produced it.
 */
export abstract class BaseEvent {
  public readonly timestamp: Date;
  public readonly correlationId: string | undefined;

  /**
   * @param correlationId Falls back to the async context when omitted.
   */
  protected constructor(correlationId?: string) {
    this.timestamp = new Date();
    this.correlationId = correlationId ?? getCorrelationId();
  }
}
