export { BaseEvent } from './base.event';
export { EVENT_NAMES } from './event-catalog';
export type { EventName } from './event-catalog';
export { OrderFilledEvent } from './broker.events';
export {
  EnvironmentUpdatedEvent,
  EnvironmentUpdateFailedEvent,
} from './simulation.events';
