import { BaseEvent } from './base.event';

export class EnvironmentUpdatedEvent extends BaseEvent {
  constructor(
    public readonly simulatedTime: Date,
    public readonly trackedPairs: string[],
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class EnvironmentUpdateFailedEvent extends BaseEvent {
  constructor(
    public readonly reasonCode: number | null,
    public readonly reason: string,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
