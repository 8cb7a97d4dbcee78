/**
 * Centralized catalog of all domain event names.
 * Use these constants when emitting or subscribing to events.
 *
 * Naming Convention:
 * - Event names: dot.notation.lowercase
 * - Constants: UPPER_SNAKE_CASE
 * - Event classes: PascalCase matching the action (e.g., OrderFilledEvent)
 */
export const EVENT_NAMES = {
  /** Emitted when the simulated broker settles an order */
  ORDER_FILLED: 'broker.order.filled',

  /** Emitted after each scheduled catch-up of the simulated environment */
  ENVIRONMENT_UPDATED: 'simulation.environment.updated',

  /** Emitted when a scheduled environment update throws */
  ENVIRONMENT_UPDATE_FAILED: 'simulation.environment.update_failed',
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
